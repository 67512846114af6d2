import { dedupeGraph, diff, indexGraph } from "@graph/diff";
import { UnknownNodeKindError } from "@graph/errors";
import { getNodeModule, isNodeKind } from "@graph/nodeRegistry";
import { OUTPUT_ID } from "@graph/types";
import type { Connection, Graph, GraphNode, NodeId, NodeProps, Output } from "@graph/types";
import type {
  AudioContextLike,
  AudioNodeInstance,
  AudioNodeLike,
  AudioNodeServices,
  AudioParamLike,
} from "@/types/audioRuntime";
import type { AssetCache } from "./assetCache";

export type ApplierOptions = Readonly<{
  assets: AssetCache;
  createContext: () => AudioContextLike;
  resolveMediaElement?: (id: string) => HTMLMediaElement | null;
  resolveMediaStream?: (id: string) => MediaStream | null;
}>;

export type LiveNode = Readonly<{
  id: NodeId;
  instance: AudioNodeInstance;
  props: NodeProps;
  outputs: Output;
}>;

type Edge = Readonly<{
  from: NodeId;
  to: NodeId;
  source: AudioNodeLike;
  target: AudioNodeLike | AudioParamLike;
}>;

function edgeKey(from: NodeId, conn: Connection): string {
  return JSON.stringify([from, conn.key, conn.destination ?? null]);
}

/**
 * Owns the audio context and keeps its node graph in step with the last
 * submitted description.
 *
 * Nodes whose assets are not decoded yet are held back: a new node is left out,
 * an existing one keeps its previous definition. Each pending URL re-applies the
 * latest submitted graph once it decodes.
 */
export class LiveGraphApplier {
  private ctx: AudioContextLike | null = null;
  private disabled = false;
  private disposed = false;
  private live = new Map<NodeId, LiveNode>();
  private edges = new Map<string, Edge>();
  private applied: Graph = [];
  private submitted: Graph = [];
  private waiting = new Map<string, () => void>();
  private readonly assets: AssetCache;
  private readonly createContext: () => AudioContextLike;
  private readonly services: AudioNodeServices;

  constructor(options: ApplierOptions) {
    this.assets = options.assets;
    this.createContext = options.createContext;
    this.services = {
      getBuffer: (url) => this.assets.resolve(url),
      resolveMediaElement: options.resolveMediaElement ?? (() => null),
      resolveMediaStream: options.resolveMediaStream ?? (() => null),
    };
  }

  /** The audio context, created on first use. Null once creation has failed. */
  ensureContext(): AudioContextLike | null {
    if (this.ctx) return this.ctx;
    if (this.disabled || this.disposed) return null;
    try {
      this.ctx = this.createContext();
    } catch (e) {
      this.disabled = true;
      console.warn("[LiveGraphApplier] audio runtime unavailable, graph updates disabled:", e);
      return null;
    }
    return this.ctx;
  }

  isDisabled(): boolean {
    return this.disabled;
  }

  currentTime(): number | null {
    return this.ctx?.currentTime ?? null;
  }

  liveNodeIds(): NodeId[] {
    return [...this.live.keys()];
  }

  liveNode(id: NodeId): LiveNode | null {
    return this.live.get(id) ?? null;
  }

  apply(graph: Graph): void {
    for (const node of graph) {
      const kind: string = node.props.kind;
      if (!isNodeKind(kind)) throw new UnknownNodeKindError(kind, node.id);
    }
    if (this.disposed) return;
    this.submitted = graph;

    const ctx = this.ensureContext();
    if (!ctx) return;

    const previous = indexGraph(this.applied);
    const pending = new Set<string>();
    const resolvable: GraphNode[] = [];
    for (const node of dedupeGraph(graph)) {
      const missing = this.missingAssets(node.props);
      if (missing.length === 0) {
        resolvable.push(node);
        continue;
      }
      for (const url of missing) pending.add(url);
      const held = previous.get(node.id);
      if (held) resolvable.push(held);
    }

    const ops = diff(this.applied, resolvable);
    for (const op of ops) {
      if (op.type === "remove") this.destroy(op.id);
    }
    for (const op of ops) {
      if (op.type === "upsert") this.upsert(ctx, op.node);
    }
    this.reconnect(ctx);

    this.applied = resolvable.flatMap((node) => {
      const liveNode = this.live.get(node.id);
      return liveNode ? [{ id: liveNode.id, props: liveNode.props, outputs: liveNode.outputs }] : [];
    });
    this.waitFor(pending);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const cancel of this.waiting.values()) cancel();
    this.waiting.clear();
    for (const id of [...this.live.keys()]) this.destroy(id);
    this.applied = [];
    this.submitted = [];

    const ctx = this.ctx;
    this.ctx = null;
    void ctx?.close().catch((e: unknown) => {
      console.error("[LiveGraphApplier] failed to close audio context:", e);
    });
  }

  private missingAssets(props: NodeProps): string[] {
    const urls = getNodeModule(props.kind).assets?.(props) ?? [];
    return urls.filter((url) => this.assets.resolve(url) === null);
  }

  private upsert(ctx: AudioContextLike, node: GraphNode) {
    const existing = this.live.get(node.id);
    if (existing && !this.needsRecreate(node.props, existing.props)) {
      try {
        existing.instance.update(node.props, existing.props);
      } catch (e) {
        console.error(`[LiveGraphApplier] failed to update node "${node.id}":`, e);
        return;
      }
      this.live.set(node.id, { ...existing, props: node.props, outputs: node.outputs });
      return;
    }

    if (existing) this.destroy(node.id);
    let instance: AudioNodeInstance;
    try {
      instance = getNodeModule(node.props.kind).audioFactory.create(ctx, node.props, this.services);
    } catch (e) {
      console.error(`[LiveGraphApplier] failed to create ${node.props.kind} node "${node.id}":`, e);
      return;
    }
    this.live.set(node.id, { id: node.id, instance, props: node.props, outputs: node.outputs });
  }

  private needsRecreate(next: NodeProps, prev: NodeProps): boolean {
    if (next.kind !== prev.kind) return true;
    return getNodeModule(next.kind).shouldRecreate?.(next, prev) ?? false;
  }

  private destroy(id: NodeId) {
    const node = this.live.get(id);
    if (!node) return;

    // Edges keyed to OUTPUT_ID lead to the context destination, never to a node of that id.
    const reachable = id !== OUTPUT_ID;
    for (const [key, edge] of this.edges) {
      const incoming = reachable && edge.to === id;
      if (incoming && edge.from !== id) this.disconnectEdge(edge);
      if (incoming || edge.from === id) this.edges.delete(key);
    }
    try {
      node.instance.onRemove();
    } catch (e) {
      console.error(`[LiveGraphApplier] failed to tear down node "${id}":`, e);
    }
    this.live.delete(id);
  }

  private resolveTarget(ctx: AudioContextLike, conn: Connection): AudioNodeLike | AudioParamLike | null {
    if (conn.key === OUTPUT_ID) return conn.destination ? null : ctx.destination;
    const target = this.live.get(conn.key);
    if (!target) return null;
    return conn.destination ? target.instance.getParam(conn.destination) : target.instance.input;
  }

  private reconnect(ctx: AudioContextLike) {
    const desired = new Map<string, Edge>();
    for (const node of this.live.values()) {
      const source = node.instance.output;
      if (!source) continue;
      for (const conn of node.outputs) {
        const target = this.resolveTarget(ctx, conn);
        if (!target) continue;
        desired.set(edgeKey(node.id, conn), { from: node.id, to: conn.key, source, target });
      }
    }

    for (const [key, edge] of this.edges) {
      if (desired.has(key)) continue;
      this.disconnectEdge(edge);
      this.edges.delete(key);
    }

    for (const [key, edge] of desired) {
      if (this.edges.has(key)) continue;
      try {
        edge.source.connect(edge.target);
      } catch (e) {
        console.error(`[LiveGraphApplier] failed to connect "${edge.from}" to "${edge.to}":`, e);
        continue;
      }
      this.edges.set(key, edge);
    }
  }

  private disconnectEdge(edge: Edge) {
    try {
      edge.source.disconnect(edge.target);
    } catch (e) {
      console.error(`[LiveGraphApplier] failed to disconnect "${edge.from}" from "${edge.to}":`, e);
    }
  }

  private waitFor(urls: Iterable<string>) {
    for (const url of urls) {
      if (this.waiting.has(url)) continue;
      const cancel = this.assets.whenDecoded(url, () => {
        this.waiting.delete(url);
        this.apply(this.submitted);
      });
      this.waiting.set(url, cancel);
    }
  }
}
