/** A node carries a kind no module implements. Malformed input, never retried. */
export class UnknownNodeKindError extends Error {
  override readonly name = "UnknownNodeKindError";

  constructor(
    readonly kind: string,
    readonly nodeId?: string,
  ) {
    super(
      nodeId === undefined
        ? `Unsupported audio node: ${kind}`
        : `Unsupported audio node: ${kind} (node "${nodeId}")`,
    );
  }
}

/** A wire-format graph document failed validation. */
export class GraphFormatError extends Error {
  override readonly name = "GraphFormatError";
}
