// @vitest-environment jsdom
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { act, createElement } from "react";
import { createRoot } from "react-dom/client";
import type { Graph } from "@graph/types";
import { FakeAudioContext } from "../testing/fakeAudioContext";
import { flush } from "../testing/async";
import { useAudioGraph } from "./useAudioGraph";
import type { UseAudioGraphOptions } from "./useAudioGraph";

type HarnessProps = { graph: Graph; options: UseAudioGraphOptions };
type HookResult = ReturnType<typeof useAudioGraph>;

async function renderHarness(initial: HarnessProps) {
  const result: { current: HookResult | null } = { current: null };
  function Harness(props: HarnessProps) {
    result.current = useAudioGraph(props.graph, props.options);
    return null;
  }

  const root = createRoot(document.createElement("div"));
  await act(async () => {
    root.render(createElement(Harness, initial));
  });

  return {
    result,
    rerender: async (props: HarnessProps) => {
      await act(async () => {
        root.render(createElement(Harness, props));
      });
    },
    unmount: async () => {
      await act(async () => {
        root.unmount();
      });
    },
  };
}

const quiet: Graph = [{ id: "amp", outputs: [{ key: "output" }], props: { kind: "gain" } }];
const loud: Graph = [{ id: "amp", outputs: [{ key: "output" }], props: { kind: "gain", gain: 0.5 } }];

describe("useAudioGraph", () => {
  beforeEach(() => {
    vi.stubGlobal("IS_REACT_ACT_ENVIRONMENT", true);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("should render the graph and follow updates", async () => {
    const ctx = new FakeAudioContext();
    const options: UseAudioGraphOptions = { engine: { createContext: () => ctx } };
    const harness = await renderHarness({ graph: quiet, options });

    expect(ctx.log).toEqual(["create gain#1", "connect gain#1 -> destination"]);
    expect(harness.result.current?.engine).not.toBeNull();

    const mark = ctx.log.length;
    await harness.rerender({ graph: loud, options });
    expect(ctx.log.slice(mark)).toEqual(["gain#1.gain.cancelScheduledValues(0)", "gain#1.gain.value = 0.5"]);

    await harness.unmount();
    expect(ctx.log.at(-1)).toBe("disconnect gain#1");
  });

  it("should report decoded assets", async () => {
    const ctx = new FakeAudioContext();
    const harness = await renderHarness({
      graph: [],
      options: {
        assets: ["kick.wav"],
        engine: { createContext: () => ctx, fetchAsset: async () => new ArrayBuffer(8) },
      },
    });
    await act(async () => {
      await flush();
    });

    expect(harness.result.current?.decodedAssets).toEqual(["kick.wav"]);
    await harness.unmount();
  });

  it("should forward ticks", async () => {
    const ctx = new FakeAudioContext();
    ctx.currentTime = 2;
    const onTick = vi.fn();
    const harness = await renderHarness({
      graph: [],
      options: { onTick, engine: { createContext: () => ctx, tickIntervalMs: 5 } },
    });

    await act(async () => {
      await new Promise((resolve) => setTimeout(resolve, 30));
    });

    expect(onTick).toHaveBeenCalledWith(2);
    await harness.unmount();
  });
});
