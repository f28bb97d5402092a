/** GraphML export for acyclic graphs. */

import fs from 'node:fs';
import path from 'node:path';
import type { DirectedGraph } from '../utils/dag.js';
import { StructuralError } from '../utils/errors.js';
import { computeExecutionOrder } from './ordering.js';

const GRAPHML_OPEN =
  '<graphml xmlns="http://graphml.graphdrawing.org/xmlns" ' +
  'xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" ' +
  'xsi:schemaLocation="http://graphml.graphdrawing.org/xmlns http://graphml.graphdrawing.org/xmlns/1.0/graphml.xsd">';

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
};

export function escapeXml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch);
}

/** Serialize an acyclic graph as a GraphML document. Throws StructuralError for a graph with cycles. */
export function toGraphML(graph: DirectedGraph): string {
  const result = computeExecutionOrder(graph);
  if (!result.ok) {
    throw new StructuralError('Graph is not a directed acyclic graph', result.cycleEdges);
  }
  const lines = ["<?xml version='1.0' encoding='utf-8'?>", GRAPHML_OPEN, '  <graph edgedefault="directed">'];
  for (const node of graph.nodes()) {
    lines.push(`    <node id="${escapeXml(node)}" />`);
  }
  for (const { src, dst } of graph.edges()) {
    lines.push(`    <edge source="${escapeXml(src)}" target="${escapeXml(dst)}" />`);
  }
  lines.push('  </graph>', '</graphml>', '');
  return lines.join('\n');
}

/** Write `graph` to `filePath` if it is acyclic. Returns false, writing nothing, otherwise. */
export function exportToGraphML(graph: DirectedGraph, filePath: string): boolean {
  let document: string;
  try {
    document = toGraphML(graph);
  } catch (err: unknown) {
    if (err instanceof StructuralError) return false;
    throw err;
  }
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, document, 'utf-8');
  return true;
}
