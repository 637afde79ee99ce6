export {
    DiagramRequestSchema,
    NodeSpecSchema,
    EdgeSpecSchema,
    REQUEST_KINDS,
    FLOW_ROLES,
    ARCHITECTURE_ROLES,
    NODE_ROLES,
    formatIssues,
    type RequestKind,
    type FlowRole,
    type ArchitectureRole,
    type NodeRole,
    type NodeSpec,
    type EdgeSpec,
    type DiagramRequest,
    type DiagramRequestInput,
} from "./schema";
export { RequestErrorCode, RequestValidationError } from "./errors";
export { parseRequest, validateRequest, type RequestOverrides } from "./parse";
export {
    RequestTranslator,
    nodeKey,
    type DiagramDefaults,
    type TranslatorOptions,
    type SkippedEdge,
    type Translation,
} from "./translator";
export { EXAMPLE_REQUEST, EXAMPLE_OUTPUT } from "./example";
