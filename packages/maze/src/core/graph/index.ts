/**
 * Cavern graph: model, assembly and hop distances.
 */

export * from "./bfs-distance";
export * from "./cavern";
export {
  CavernNode,
  Edge,
  type NodeId,
  takeGold,
  Tile,
  type TilePosition,
} from "./model";
