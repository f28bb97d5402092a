/** Zod schemas for project files and item configuration. Caps string lengths and array sizes. */

import { z } from 'zod';
import { MAX_PROJECT_ITEMS } from './constants.js';

/** Item names double as node names and as file names in exports. */
export const ItemNameSchema = z
  .string()
  .min(1)
  .max(200)
  .refine((s) => s.trim() === s, { message: 'Item name must not start or end with whitespace' });

const FileListSchema = z.array(z.string().min(1).max(1000)).max(100);

const DataStoreSchema = z.object({
  kind: z.literal('data_store'),
  name: ItemNameSchema,
  description: z.string().max(2000).optional(),
  url: z.string().min(1).max(2000),
}).strict();

const DataConnectionSchema = z.object({
  kind: z.literal('data_connection'),
  name: ItemNameSchema,
  description: z.string().max(2000).optional(),
  references: FileListSchema,
}).strict();

const ToolSchema = z.object({
  kind: z.literal('tool'),
  name: ItemNameSchema,
  description: z.string().max(2000).optional(),
  command: z.string().min(1).max(500),
  args: z.array(z.string().max(1000)).max(100).optional(),
  cwd: z.string().max(1000).optional(),
  inputFiles: FileListSchema.optional(),
  optionalInputFiles: FileListSchema.optional(),
  outputFiles: FileListSchema.optional(),
}).strict();

const ViewSchema = z.object({
  kind: z.literal('view'),
  name: ItemNameSchema,
  description: z.string().max(2000).optional(),
}).strict();

export const ItemConfigSchema = z.discriminatedUnion('kind', [
  DataStoreSchema,
  DataConnectionSchema,
  ToolSchema,
  ViewSchema,
]);

export type ItemConfig = z.infer<typeof ItemConfigSchema>;
export type DataStoreConfig = z.infer<typeof DataStoreSchema>;
export type DataConnectionConfig = z.infer<typeof DataConnectionSchema>;
export type ToolConfig = z.infer<typeof ToolSchema>;
export type ViewConfig = z.infer<typeof ViewSchema>;
export type ItemKind = ItemConfig['kind'];

export const ConnectionSchema = z.object({
  from: ItemNameSchema,
  to: ItemNameSchema,
}).strict();

export const ProjectFileSchema = z.object({
  version: z.number().int().min(1),
  name: z.string().min(1).max(200),
  description: z.string().max(2000).optional(),
  items: z.array(ItemConfigSchema).max(MAX_PROJECT_ITEMS),
  connections: z.array(ConnectionSchema).max(MAX_PROJECT_ITEMS * 10),
}).strict().superRefine((project, ctx) => {
  const names = new Set<string>();
  project.items.forEach((item, i) => {
    if (names.has(item.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['items', i, 'name'], message: `Duplicate item name: ${item.name}` });
    }
    names.add(item.name);
  });
  project.connections.forEach((conn, i) => {
    for (const end of ['from', 'to'] as const) {
      if (!names.has(conn[end])) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['connections', i, end], message: `Unknown item: ${conn[end]}` });
      }
    }
  });
});

export type ProjectFile = z.infer<typeof ProjectFileSchema>;
export type Connection = z.infer<typeof ConnectionSchema>;

/** Flatten zod issues into `path: message` lines. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}
