import { useEffect, useRef, useState } from "react";
import type { Graph } from "@graph/types";
import { AudioEngine } from "../engine";
import type { EngineOptions } from "../types";

export type UseAudioGraphOptions = Readonly<{
  /** URLs to fetch and decode ahead of the nodes that play them */
  assets?: ReadonlyArray<string>;
  onTick?: (time: number) => void;
  /** Read once, when the engine is created */
  engine?: Partial<EngineOptions>;
}>;

/**
 * Host binding for React: owns an `AudioEngine` for the lifetime of the
 * component and keeps it rendering `graph`. The engine is disposed on unmount.
 */
export function useAudioGraph(graph: Graph, options: UseAudioGraphOptions = {}) {
  const { assets, onTick } = options;
  const engineOptions = useRef(options.engine);
  const onTickRef = useRef(onTick);
  const [engine, setEngine] = useState<AudioEngine | null>(null);
  const [decodedAssets, setDecodedAssets] = useState<ReadonlyArray<string>>([]);

  useEffect(() => {
    onTickRef.current = onTick;
  }, [onTick]);

  useEffect(() => {
    const next = new AudioEngine(engineOptions.current);
    const unsubscribe = next.onEvent((event) => {
      if (event.type === "tick") onTickRef.current?.(event.time);
      else setDecodedAssets(event.urls);
    });
    next.onAttach();
    setEngine(next);
    return () => {
      unsubscribe();
      next.dispose();
    };
  }, []);

  useEffect(() => {
    engine?.setGraph(graph);
  }, [engine, graph]);

  useEffect(() => {
    if (assets) engine?.setAssets(assets);
  }, [engine, assets]);

  return { engine, decodedAssets };
}
