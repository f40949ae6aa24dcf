import type { ComparisonSuite } from "../../Benchmark.ts";

export const suite: ComparisonSuite<number> = {
  name: "cells",
  sizes: [1, 2],
  prepare: size => {
    if (size === 13) throw new Error(`no input for ${size}`);
    return size;
  },
  cases: [
    { name: "ok", variant: n => n * 2 },
    {
      name: "throws",
      variant: () => {
        throw new Error("bad case");
      },
    },
  ],
};

export const notASuite = 5;
