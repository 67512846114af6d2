export { AudioEngine } from "./audio/engine";
export { DEFAULT_ENGINE_OPTIONS } from "./audio/types";
export type { EngineOptions } from "./audio/types";
export type { EngineEvent, EngineEventSubscriber } from "./audio/events";
export { useAudioGraph } from "./audio/hooks";
export type { UseAudioGraphOptions } from "./audio/hooks";
export { LiveGraphApplier } from "./audio/applier";
export type { ApplierOptions, LiveNode } from "./audio/applier";
export { AssetCache, fetchArrayBuffer } from "./audio/assetCache";
export type { AssetCacheOptions, AssetState, DecodeAsset, FetchAsset } from "./audio/assetCache";
export { RenderLoop } from "./audio/renderLoop";
export type { RenderLoopOptions } from "./audio/renderLoop";

export { dedupeGraph, diff, indexGraph } from "./graph/diff";
export { deepEqual, nodesEqual } from "./graph/equality";
export { GraphFormatError, UnknownNodeKindError } from "./graph/errors";
export { getNodeModule, isNodeKind, kindFromWireTag, listNodeKinds } from "./graph/nodeRegistry";
export { OUTPUT_ID, PARAM_DESTINATIONS } from "./graph/types";
export type {
  AutomationMethod,
  Connection,
  Graph,
  GraphNode,
  GraphOperation,
  NodeId,
  NodeKind,
  NodeProps,
  Output,
  Param,
  ParamDestination,
} from "./graph/types";

export { NODE_MODULES } from "./nodes";
export type { NodeModuleMap } from "./nodes";
export type { NodeModule, PropsDecodeResult } from "./types/nodeModule";
export type { AudioBufferLike, AudioContextLike, AudioNodeLike, AudioParamLike } from "./types/audioRuntime";

export { decodeGraph, encodeGraph, outputToWire, paramToWire } from "./project/wireFormat";
export type { DecodeResult } from "./project/wireFormat";
export type { WireGraph, WireNode, WireOutput, WireParam } from "./project/schemas";
