export * from "./types";
export * from "./request";
export { GeneratePipeline } from "./pipeline";
export { LogSubscriber } from "./log-subscriber";
export { ErrorSubscriber } from "./error-subscriber";
