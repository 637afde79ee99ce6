export { DocumentWriter, resolveOutputPath } from "./writer";
export { DOCUMENT_EXTENSION, DocumentWriteError } from "./types";
