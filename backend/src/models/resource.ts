/** Resource model -- the data items hand to one another along edges. */

export type ResourceKind = 'database' | 'file' | 'data';

export interface ResourceMetadata {
  is_output?: boolean;
  [key: string]: unknown;
}

export interface Resource {
  readonly producer: string;
  readonly kind: ResourceKind;
  readonly locator: string;
  readonly metadata: Readonly<ResourceMetadata>;
}

/** Build a frozen resource. Metadata is copied so callers cannot mutate it later. */
export function makeResource(
  producer: string,
  kind: ResourceKind,
  locator: string,
  metadata: ResourceMetadata = {},
): Resource {
  return Object.freeze({
    producer,
    kind,
    locator,
    metadata: Object.freeze({ ...metadata }),
  });
}
