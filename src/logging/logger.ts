import { DEBUG_MODE } from "../config.js";

import { createLogger, type Logger } from "./configLogger.js";

const logger: Logger = createLogger(DEBUG_MODE, "genai");

export default logger;
