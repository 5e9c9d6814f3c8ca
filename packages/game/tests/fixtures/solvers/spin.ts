import type { Solver } from "../../../src";

const solver: Solver = {
  exploreForTarget(view) {
    while (view.distanceToTarget() >= 0) {
      // never returns
    }
  },
  scramToExit() {},
};

export default solver;
