export type RenderLoopOptions = Readonly<{
  intervalMs: number;
  /** Current audio time, or null while there is no context. */
  getTime: () => number | null;
  onTick: (time: number) => void;
}>;

/**
 * Fixed-interval tick source driven by a `setTimeout` chain.
 * Once stopped it never fires again; a stopped loop cannot be restarted.
 */
export class RenderLoop {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private stopped = false;

  constructor(private readonly options: RenderLoopOptions) {}

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.stopped || this.timer !== null) return;
    this.schedule();
  }

  stop(): void {
    this.stopped = true;
    if (this.timer !== null) clearTimeout(this.timer);
    this.timer = null;
  }

  private schedule() {
    this.timer = setTimeout(() => this.step(), this.options.intervalMs);
  }

  private step() {
    this.timer = null;
    if (this.stopped) return;

    const time = this.options.getTime();
    if (time !== null) {
      try {
        this.options.onTick(time);
      } catch (e) {
        console.error("[RenderLoop] tick handler error:", e);
      }
    }
    if (!this.stopped) this.schedule();
  }
}
