import type { Solver } from "../../../src";

const solver: Solver = {
  exploreForTarget() {
    throw new Error("solver exploded");
  },
  scramToExit() {},
};

export default solver;
