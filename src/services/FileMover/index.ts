export * from "./FileMover";
export * from "./FileMoverNode";
