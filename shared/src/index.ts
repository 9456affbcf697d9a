export * from "./types";
export * from "./game/board";
export * from "./game/constants";
export * from "./game/move";
export * from "./game/piece";
export * from "./game/movement";
export * from "./game/position";
