import { logger } from "./packages/sdk/src/observability/logs.js";

logger.setEnabled(false);
