import type { Connector } from "../diagram";

/**
 * Outcome of connecting two registered keys. A key that was never registered
 * is not an error: nothing is drawn and the missing keys are reported.
 */
export type ConnectResult =
  | { status: "connected"; connectors: Connector[] }
  | { status: "skipped"; missingKeys: string[] };
