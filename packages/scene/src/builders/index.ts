export {
  Flowchart,
  START_KEY,
  END_KEY,
  NODE_WIDTH,
  NODE_HEIGHT,
  DECISION_WIDTH,
  DECISION_HEIGHT,
  type FlowDirection,
  type FlowchartOptions,
  type FlowNodeOptions,
  type FlowConnectOptions,
} from "./flowchart";
export {
  ArchitectureDiagram,
  type ComponentOptions,
  type ArchitectureConnectOptions,
} from "./architecture";
export type { ConnectResult } from "./types";
