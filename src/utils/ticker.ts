/**
 * Fixed-interval callback source. Returns a function that stops the ticks.
 */
export interface Ticker {
  every(intervalMs: number, tick: () => void): () => void;
}

export const intervalTicker: Ticker = {
  every(intervalMs: number, tick: () => void): () => void {
    const handle = setInterval(tick, intervalMs);
    return () => clearInterval(handle);
  },
};
