import type { Cavern, CavernNode } from "@cavern/maze";

export type Phase = "find" | "scram";

/**
 * Everything a display can be told about a running game.
 */
export type DisplayEvent =
  | { readonly type: "cavern"; readonly phase: Phase; readonly cavern: Cavern }
  | { readonly type: "phase"; readonly label: string }
  | { readonly type: "position"; readonly node: CavernNode }
  | { readonly type: "steps"; readonly remaining: number }
  | { readonly type: "bonus"; readonly factor: number }
  | { readonly type: "gold"; readonly collected: number; readonly score: number }
  | { readonly type: "error"; readonly message: string };

export interface DisplaySink {
  notify(event: DisplayEvent): void;
}

/** Display-off mode. */
export const nullDisplay: DisplaySink = {
  notify: () => undefined,
};
