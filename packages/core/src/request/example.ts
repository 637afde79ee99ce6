import type { DiagramRequestInput } from "./schema";

export const EXAMPLE_OUTPUT = "example.excalidraw";

/**
 * Three-tier Frontend → Backend → Database diagram written by `sketchloom example`.
 */
export const EXAMPLE_REQUEST = {
    kind: "diagram",
    nodes: [
        { id: "frontend", label: "Frontend", x: 100, y: 100, color: "blue" },
        { id: "backend", label: "Backend", x: 350, y: 100, color: "green" },
        { id: "database", label: "Database", x: 600, y: 100, color: "orange" },
    ],
    edges: [
        { from: "frontend", to: "backend", label: "REST API" },
        { from: "backend", to: "database", label: "SQL" },
    ],
} satisfies DiagramRequestInput;
