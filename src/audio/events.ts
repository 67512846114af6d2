export type EngineEvent =
  | { type: "tick"; time: number }
  | { type: "progress"; urls: ReadonlyArray<string> };

export type EngineEventSubscriber = (event: EngineEvent) => void;

export class EngineEventBus {
  private subscribers = new Set<EngineEventSubscriber>();

  onEvent(fn: EngineEventSubscriber): () => void {
    this.subscribers.add(fn);
    return () => this.subscribers.delete(fn);
  }

  emit(event: EngineEvent): void {
    for (const fn of this.subscribers) {
      try {
        fn(event);
      } catch (e) {
        console.error("Engine event subscriber error:", e);
      }
    }
  }

  clear(): void {
    this.subscribers.clear();
  }
}
