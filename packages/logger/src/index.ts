export { Logger } from "tslog";
export {
	createLogger,
	createJsonLogger,
	createMemoryLogger,
	type AppLogObj,
	type LogMode,
} from "./logger";
