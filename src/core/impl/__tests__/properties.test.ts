import { describe, expect, it } from "vitest";
import { BinaryHeap, type HeapMode } from "../../../index.js";

// deterministic PRNG so failures reproduce
function rng(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const randInt = (r: () => number, max: number) => Math.floor(r() * max);
const randItems = (r: () => number, n: number) => Array.from({ length: n }, () => randInt(r, 50));
const asc = (xs: number[]) => [...xs].sort((a, b) => a - b);
const ordered = (xs: number[], mode: HeapMode) => (mode === "min" ? asc(xs) : asc(xs).reverse());

function removeOne(model: number[], v: number): void {
  const i = model.indexOf(v);
  if (i >= 0) model.splice(i, 1);
}

function best(model: number[], mode: HeapMode): number {
  return mode === "min" ? Math.min(...model) : Math.max(...model);
}

const SEEDS = [1, 2, 3, 7, 42, 99, 1234, 2024];

describe("BinaryHeap properties", () => {
  it("keeps the invariant and contents across random operation sequences", () => {
    for (const seed of SEEDS) {
      const r = rng(seed);
      let mode: HeapMode = "min";
      const h = new BinaryHeap<number>({ verifySampleRate: 7 });
      const model: number[] = [];

      for (let step = 0; step < 200; step++) {
        const op = randInt(r, 10);
        switch (op) {
          case 0:
          case 1: {
            const v = randInt(r, 50);
            h.push(v);
            model.push(v);
            break;
          }
          case 2: {
            const expected = model.length ? best(model, mode) : undefined;
            expect(h.pop()).toBe(expected);
            if (expected !== undefined) removeOne(model, expected);
            break;
          }
          case 3: {
            const v = randInt(r, 50);
            const all = r() < 0.5;
            const occurrences = model.filter((x) => x === v).length;
            const expected = all ? occurrences : Math.min(1, occurrences);
            expect(h.remove(v, { all })).toBe(expected);
            for (let k = 0; k < expected; k++) removeOne(model, v);
            break;
          }
          case 4: {
            const idx = randInt(r, model.length + 2);
            const removed = h.removeAt(idx);
            if (removed !== undefined) removeOne(model, removed);
            else expect(idx).toBeGreaterThanOrEqual(model.length);
            break;
          }
          case 5:
            h.heapify();
            break;
          case 6:
            h.toggleMode();
            mode = mode === "min" ? "max" : "min";
            break;
          case 7: {
            const extra = randItems(r, randInt(r, 6));
            h.merge(BinaryHeap.from(extra, { mode }));
            model.push(...extra);
            break;
          }
          case 8: {
            const v = randInt(r, 50);
            const root = model.length ? best(model, mode) : undefined;
            const rootWins = root !== undefined && (mode === "min" ? root <= v : root >= v);
            expect(h.pushpop(v)).toBe(rootWins ? root : v);
            if (rootWins && root !== undefined) {
              removeOne(model, root);
              model.push(v);
            }
            break;
          }
          case 9: {
            const extra = randItems(r, randInt(r, 5));
            h.extend(extra);
            model.push(...extra);
            break;
          }
        }
        expect(h.isValidHeap()).toBe(true);
        expect(asc(h.toArray())).toEqual(asc(model));
      }
    }
  });

  it("drains in order for both modes", () => {
    for (const seed of SEEDS) {
      const r = rng(seed);
      for (const mode of ["min", "max"] as const) {
        const items = randItems(r, 40);
        const h = new BinaryHeap<number>({ mode });
        h.extend(items);
        expect([...h.drain()]).toEqual(ordered(items, mode));
      }
    }
  });

  it("pushpop matches push followed by pop", () => {
    for (const seed of SEEDS) {
      const r = rng(seed);
      const items = randItems(r, randInt(r, 12));
      const v = randInt(r, 50);
      const a = BinaryHeap.from(items);
      const b = a.copy();

      const viaPushpop = a.pushpop(v);
      b.push(v);
      const viaPushThenPop = b.pop();

      expect(viaPushpop).toBe(viaPushThenPop);
      expect(asc(a.toArray())).toEqual(asc(b.toArray()));
    }
  });

  it("pushpop matches push followed by pop when keys tie", () => {
    type Job = { id: number; p: number };
    for (const seed of SEEDS) {
      const r = rng(seed);
      for (const mode of ["min", "max"] as const) {
        const items: Job[] = Array.from({ length: 1 + randInt(r, 10) }, (_, id) => ({ id, p: randInt(r, 3) }));
        const v: Job = { id: -1, p: randInt(r, 3) };
        const a = BinaryHeap.from(items, { mode, key: (j) => j.p });
        const b = a.copy();

        const viaPushpop = a.pushpop(v);
        b.push(v);
        const viaPushThenPop = b.pop();

        expect(viaPushpop).toBe(viaPushThenPop);
        const ids = (h: BinaryHeap<Job>) => h.toArray().map((j) => j.id).sort((x, y) => x - y);
        expect(ids(a)).toEqual(ids(b));
      }
    }
  });

  it("restores the invariant after removing any index", () => {
    for (const seed of SEEDS) {
      const r = rng(seed);
      for (const mode of ["min", "max"] as const) {
        const h = BinaryHeap.from(randItems(r, 31), { mode });
        const original = h.toArray();
        for (let i = 0; i < original.length; i++) {
          const c = h.copy();
          expect(c.removeAt(i)).toBe(original[i]);
          expect(c.isValidHeap()).toBe(true);
          const expected = [...original];
          expected.splice(i, 1);
          expect(asc(c.toArray())).toEqual(asc(expected));
        }
      }
    }
  });

  it("nlargest agrees with a full sort", () => {
    for (const seed of SEEDS) {
      const r = rng(seed);
      const items = randItems(r, 25);
      const n = randInt(r, 30);
      expect(BinaryHeap.from(items, { mode: "max" }).nlargest(n)).toEqual(ordered(items, "max").slice(0, n));
      expect(BinaryHeap.from(items).nlargest(n)).toEqual(ordered(items, "min").slice(0, n));
    }
  });
});
