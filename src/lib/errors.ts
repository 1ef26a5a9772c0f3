export type GraphErrorCode = "node-not-found" | "edge-not-found";

export class GraphError extends Error {
  readonly code: GraphErrorCode;

  constructor(code: GraphErrorCode, message: string) {
    super(`${code}: ${message}`);
    this.name = "GraphError";
    this.code = code;
  }
}
