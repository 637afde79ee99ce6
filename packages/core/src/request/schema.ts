import { z } from "zod";

export const REQUEST_KINDS = ["diagram", "flowchart", "architecture"] as const;
export const FLOW_ROLES = ["start", "end", "process", "decision"] as const;
export const ARCHITECTURE_ROLES = ["component", "service", "database", "user"] as const;
export const NODE_ROLES = [
    "start",
    "end",
    "process",
    "decision",
    "component",
    "service",
    "database",
    "user",
] as const;

export type RequestKind = (typeof REQUEST_KINDS)[number];
export type FlowRole = (typeof FLOW_ROLES)[number];
export type ArchitectureRole = (typeof ARCHITECTURE_ROLES)[number];
export type NodeRole = (typeof NODE_ROLES)[number];

const ROLES_BY_KIND: Record<RequestKind, readonly NodeRole[]> = {
    diagram: [],
    flowchart: FLOW_ROLES,
    architecture: ARCHITECTURE_ROLES,
};

/** Node style fields, and the ones each role draws with */
const STYLE_FIELDS = ["color", "shape", "width", "height"] as const;
type StyleField = (typeof STYLE_FIELDS)[number];

const STYLE_FIELDS_BY_ROLE: Record<NodeRole, readonly StyleField[]> = {
    process: STYLE_FIELDS,
    start: [],
    end: [],
    decision: ["color"],
    component: ["color", "width", "height"],
    service: ["color"],
    database: ["color"],
    user: [],
};

/** Role a node without one is drawn as; plain diagrams have none */
const DEFAULT_ROLE: Record<RequestKind, NodeRole | undefined> = {
    diagram: undefined,
    flowchart: "process",
    architecture: "component",
};

const coordinate = z.number().finite();
// zero and negative sizes are drawn as given
const extent = z.number().finite();

export const NodeSpecSchema = z
    .object({
        id: z.string().min(1).optional(),
        label: z.string().optional(),
        x: coordinate.optional(),
        y: coordinate.optional(),
        color: z.string().min(1).optional(),
        shape: z.enum(["rectangle", "ellipse", "diamond"]).optional(),
        role: z.enum(NODE_ROLES).optional(),
        width: extent.optional(),
        height: extent.optional(),
    })
    .strict();

export const EdgeSpecSchema = z
    .object({
        from: z.string().min(1),
        to: z.string().min(1),
        label: z.string().optional(),
        bidirectional: z.boolean().optional(),
        color: z.string().min(1).optional(),
    })
    .strict();

export const DiagramRequestSchema = z
    .object({
        kind: z.enum(REQUEST_KINDS).default("diagram"),
        direction: z.enum(["vertical", "horizontal"]).optional(),
        spacing: z.number().finite().nonnegative().optional(),
        background: z.string().min(1).optional(),
        nodes: z.array(NodeSpecSchema),
        edges: z.array(EdgeSpecSchema).default([]),
    })
    .strict()
    .superRefine((request, ctx) => {
        const allowed = ROLES_BY_KIND[request.kind];
        request.nodes.forEach((node, index) => {
            if (node.role !== undefined && !allowed.includes(node.role)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ["nodes", index, "role"],
                    message: `Role "${node.role}" is not valid in a ${request.kind} request`,
                });
                return;
            }

            const role = node.role ?? DEFAULT_ROLE[request.kind];
            if (role === undefined) return;
            const drawn = STYLE_FIELDS_BY_ROLE[role];
            for (const field of STYLE_FIELDS) {
                if (node[field] !== undefined && !drawn.includes(field)) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        path: ["nodes", index, field],
                        message: `Role "${role}" draws a fixed ${field}`,
                    });
                }
            }
        });
    });

export type NodeSpec = z.infer<typeof NodeSpecSchema>;
export type EdgeSpec = z.infer<typeof EdgeSpecSchema>;
/** Validated request, with defaults applied */
export type DiagramRequest = z.output<typeof DiagramRequestSchema>;
/** Request as written by callers */
export type DiagramRequestInput = z.input<typeof DiagramRequestSchema>;

/**
 * One line per issue, prefixed with the JSON path when there is one.
 */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    );
}
