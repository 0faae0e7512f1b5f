import type { ClothingCategory, ClothingItem } from "../services/styling/types.js";
import type { Ticker } from "../utils/ticker.js";

export function makeItem(id: string, category: ClothingCategory, tags: string[] = []): ClothingItem {
  return { id, category, tags };
}

// Wardrobe for "Job interview today"
export function interviewWardrobe(): ClothingItem[] {
  return [
    makeItem("top-1", "top", ["Formal", "Business"]),
    makeItem("bottom-1", "bottom", ["Formal"]),
    makeItem("shoes-1", "shoes", ["Casual"]),
  ];
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export interface ManualTicker extends Ticker {
  intervals: number[];
  fire(): void;
  activeCount(): number;
}

export function manualTicker(): ManualTicker {
  const ticks = new Set<() => void>();
  const intervals: number[] = [];

  return {
    intervals,
    every(intervalMs, tick) {
      intervals.push(intervalMs);
      ticks.add(tick);
      return () => {
        ticks.delete(tick);
      };
    },
    fire() {
      for (const tick of [...ticks]) tick();
    },
    activeCount() {
      return ticks.size;
    },
  };
}
