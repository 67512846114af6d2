import type { NodeKind, NodeProps } from "@graph/types";
import type { AudioNodeFactory } from "./audioRuntime";

export type PropsDecodeResult<TProps> =
  | { success: true; props: TProps }
  | { success: false; error: string };

export type NodeModule<K extends NodeKind = NodeKind> = Readonly<{
  kind: K;
  /** Kind tag used by the JSON wire format, e.g. `"BiquadFilter"`. */
  wireTag: string;
  decode: (raw: unknown) => PropsDecodeResult<NodeProps<K>>;
  audioFactory: AudioNodeFactory<K>;
  /** URLs of binary assets the node cannot be built without. */
  assets?: (props: NodeProps<K>) => ReadonlyArray<string>;
  /** True when a change cannot be applied in place and the live node must be rebuilt. */
  shouldRecreate?: (next: NodeProps<K>, prev: NodeProps<K>) => boolean;
}>;
