import {
    ArchitectureDiagram,
    Diagram,
    Flowchart,
    NodeRegistry,
    type ConnectResult,
    type DiagramOptions,
    type FlowDirection,
    type IdentitySource,
    type JitterSource,
} from "@sketchloom/scene";
import type { DiagramRequest, EdgeSpec, NodeSpec } from "./schema";

/**
 * Values used where neither the request nor a CLI flag gives one.
 */
export interface DiagramDefaults {
    background?: string;
    source?: string;
    direction?: FlowDirection;
    spacing?: number;
}

export interface TranslatorOptions {
    defaults?: DiagramDefaults;
    identity?: IdentitySource;
    jitter?: JitterSource;
}

/**
 * An edge that drew nothing because an endpoint is not a known node.
 */
export interface SkippedEdge {
    from: string;
    to: string;
    missingKeys: string[];
}

export interface Translation {
    diagram: Diagram;
    nodes: number;
    edges: number;
    skipped: SkippedEdge[];
}

const DEFAULT_POSITION = { x: 100, y: 100 };
const DEFAULT_LABEL = "Node";

/**
 * Key an edge refers to a node by: its id, else its label, else its
 * 1-based position in the node list.
 */
export function nodeKey(node: NodeSpec, index: number): string {
    return node.id ?? node.label ?? `node-${index + 1}`;
}

/**
 * Turns a validated request into a diagram through the builder its kind names.
 */
export class RequestTranslator {
    private readonly options: TranslatorOptions;

    constructor(options: TranslatorOptions = {}) {
        this.options = options;
    }

    translate(request: DiagramRequest): Translation {
        switch (request.kind) {
            case "flowchart":
                return this.flowchart(request);
            case "architecture":
                return this.architecture(request);
            case "diagram":
                return this.diagram(request);
        }
    }

    private diagramOptions(request: DiagramRequest): DiagramOptions {
        const defaults = this.options.defaults ?? {};
        return {
            background: request.background ?? defaults.background,
            source: defaults.source,
            identity: this.options.identity,
            jitter: this.options.jitter,
        };
    }

    private diagram(request: DiagramRequest): Translation {
        const diagram = new Diagram(this.diagramOptions(request));
        const registry = new NodeRegistry();

        request.nodes.forEach((node, index) => {
            const handle = diagram.box(
                { x: node.x ?? DEFAULT_POSITION.x, y: node.y ?? DEFAULT_POSITION.y },
                node.label ?? DEFAULT_LABEL,
                {
                    color: node.color ?? "blue",
                    shape: node.shape ?? "rectangle",
                    width: node.width,
                    height: node.height,
                },
            );
            registry.register(nodeKey(node, index), handle);
        });

        return this.connectAll(diagram, request, (edge) => this.connectRegistered(diagram, registry, edge));
    }

    private flowchart(request: DiagramRequest): Translation {
        const defaults = this.options.defaults ?? {};
        const flow = new Flowchart({
            ...this.diagramOptions(request),
            direction: request.direction ?? defaults.direction,
            spacing: request.spacing ?? defaults.spacing,
        });
        // start and end nodes share reserved builder keys, so edges resolve
        // through the handles kept under each node's own key
        const registry = new NodeRegistry();

        request.nodes.forEach((node, index) => {
            const key = nodeKey(node, index);
            if (node.x !== undefined || node.y !== undefined) {
                const next = flow.nextPosition;
                flow.positionAt(node.x ?? next.x, node.y ?? next.y);
            }

            switch (node.role ?? "process") {
                case "start":
                    registry.register(key, flow.start(node.label));
                    break;
                case "end":
                    registry.register(key, flow.end(node.label));
                    break;
                case "decision":
                    registry.register(key, flow.decision(key, node.label ?? DEFAULT_LABEL, node.color));
                    break;
                default:
                    registry.register(key, flow.node(key, node.label ?? DEFAULT_LABEL, {
                        shape: node.shape,
                        color: node.color,
                        width: node.width,
                        height: node.height,
                    }));
            }
        });

        return this.connectAll(flow, request, (edge) => this.connectRegistered(flow, registry, edge));
    }

    private architecture(request: DiagramRequest): Translation {
        const arch = new ArchitectureDiagram(this.diagramOptions(request));

        request.nodes.forEach((node, index) => {
            const key = nodeKey(node, index);
            const position = { x: node.x ?? DEFAULT_POSITION.x, y: node.y ?? DEFAULT_POSITION.y };
            const label = node.label ?? DEFAULT_LABEL;

            switch (node.role ?? "component") {
                case "service":
                    arch.service(key, label, position, node.color);
                    break;
                case "database":
                    arch.database(key, label, position, node.color);
                    break;
                case "user":
                    arch.user(key, node.label, position);
                    break;
                default:
                    arch.component(key, label, position, {
                        color: node.color,
                        width: node.width,
                        height: node.height,
                    });
            }
        });

        return this.connectAll(arch, request, (edge) =>
            arch.connect(edge.from, edge.to, {
                label: edge.label,
                bidirectional: edge.bidirectional,
                color: edge.color,
            }),
        );
    }

    /**
     * Arrow between two keyed nodes; with `bidirectional`, an unlabeled arrow back.
     */
    private connectRegistered(diagram: Diagram, registry: NodeRegistry, edge: EdgeSpec): ConnectResult {
        const pair = registry.lookupPair(edge.from, edge.to);
        if (!pair.found) {
            return { status: "skipped", missingKeys: pair.missingKeys };
        }
        const color = edge.color ?? "black";
        const connectors = [diagram.arrowBetween(pair.source, pair.target, { label: edge.label, color })];
        if (edge.bidirectional) {
            connectors.push(diagram.arrowBetween(pair.target, pair.source, { color }));
        }
        return { status: "connected", connectors };
    }

    private connectAll(
        diagram: Diagram,
        request: DiagramRequest,
        connect: (edge: EdgeSpec) => ConnectResult,
    ): Translation {
        const skipped: SkippedEdge[] = [];
        for (const edge of request.edges) {
            const result = connect(edge);
            if (result.status === "skipped") {
                skipped.push({ from: edge.from, to: edge.to, missingKeys: result.missingKeys });
            }
        }
        return {
            diagram,
            nodes: request.nodes.length,
            edges: request.edges.length - skipped.length,
            skipped,
        };
    }
}
