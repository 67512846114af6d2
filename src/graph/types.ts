export const PARAM_DESTINATIONS = [
  "frequency",
  "detune",
  "gain",
  "delayTime",
  "pan",
] as const;

export type ParamDestination = (typeof PARAM_DESTINATIONS)[number];

// Augment this interface from `src/nodes/<node>/types.ts` to register new node kinds.
// eslint-disable-next-line @typescript-eslint/no-empty-object-type
export interface NodeTypeMap {}

export type NodeKind = keyof NodeTypeMap & string;

export type NodeId = string;

/** Reserved connection target: the audio context's destination. */
export const OUTPUT_ID: NodeId = "output";

export type Connection = Readonly<{
  key: NodeId;
  /** Absent means the target's default audio input. */
  destination?: ParamDestination;
}>;

export type Output = ReadonlyArray<Connection>;

/** Automation event. Times are absolute AudioContext times in seconds. */
export type AutomationMethod =
  | Readonly<{ type: "setValueAtTime"; value: number; startTime: number }>
  | Readonly<{ type: "linearRampToValueAtTime"; value: number; endTime: number }>
  | Readonly<{ type: "exponentialRampToValueAtTime"; value: number; endTime: number }>
  | Readonly<{
      type: "setTargetAtTime";
      target: number;
      startTime: number;
      timeConstant: number;
    }>
  | Readonly<{
      type: "setValueCurveAtTime";
      values: ReadonlyArray<number>;
      startTime: number;
      duration: number;
    }>;

export type AutomationMethodType = AutomationMethod["type"];

/** Constant value, or a sequence of automation events replayed in order. */
export type Param = number | ReadonlyArray<AutomationMethod>;

export type NodePropsOf<K extends NodeKind> = Readonly<{ kind: K }> & NodeTypeMap[K];

export type NodeProps<K extends NodeKind = NodeKind> = {
  [P in K]: NodePropsOf<P>;
}[K];

export type GraphNode = Readonly<{
  id: NodeId;
  outputs: Output;
  props: NodeProps;
}>;

export type Graph = ReadonlyArray<GraphNode>;

export type GraphOperation =
  | Readonly<{ type: "upsert"; id: NodeId; node: GraphNode }>
  | Readonly<{ type: "remove"; id: NodeId }>;
