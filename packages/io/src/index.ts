export * from "./request-reader";
export * from "./document-writer";
