/** Graph shapes shared by the store, ordering engine and persistence. */

export interface Edge {
  src: string;
  dst: string;
}

export type EdgeTuple = [src: string, dst: string];

export interface SerializedGraphs {
  nodes: string[];
  edges: EdgeTuple[];
}

