import type { Solver } from "../../../src";
import { depthFirstWalk } from "./depth-first";

/** Finds the target, then paces between two tiles until the budget runs out. */
const solver: Solver = {
  exploreForTarget(view) {
    depthFirstWalk(view);
  },
  scramToExit(view) {
    for (;;) {
      const [next] = view.currentNode().neighbors();
      if (!next) return;
      view.moveTo(next);
    }
  },
};

export default solver;
