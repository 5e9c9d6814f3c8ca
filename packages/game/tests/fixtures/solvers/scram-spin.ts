import type { Solver } from "../../../src";
import { depthFirstWalk } from "./depth-first";

const solver: Solver = {
  exploreForTarget(view) {
    depthFirstWalk(view);
  },
  scramToExit(view) {
    while (view.stepsRemaining() >= 0) {
      // never returns
    }
  },
};

export default solver;
