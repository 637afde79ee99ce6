export { RequestReader } from "./reader";
export { STDIN_LABEL, type ReadOptions, type RequestSource } from "./types";
