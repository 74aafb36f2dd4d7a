/**
 * Default configuration values for schedctl.
 */

import { CONNECTION_DEFAULTS } from "@schedctl/shared";
import type { CtlConfig } from "../types/index.js";
import { DEFAULT_LOG_LEVEL } from "../logger/index.js";

export function getDefaultConfig(): CtlConfig {
	return {
		addr: CONNECTION_DEFAULTS.ADDR,
		port: CONNECTION_DEFAULTS.PORT,
		cacert: CONNECTION_DEFAULTS.CACERT,
		token: CONNECTION_DEFAULTS.TOKEN,
		logLevel: DEFAULT_LOG_LEVEL,
	};
}
