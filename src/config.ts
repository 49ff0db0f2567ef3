import { z } from "zod";
import { BIBLIOGRAPHY_ORDERS, CITATION_STYLES } from "./formatting/types.js";
import { LOG_LEVELS, logger } from "./logger.js";

export const ConfigSchema = z.object({
	PORT: z.coerce.number().int().positive().default(3000),
	NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
	LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
	DEFAULT_STYLE: z.enum(CITATION_STYLES).default("apa"),
	// Input order unless the deployment opts into style-guide alphabetical order.
	BIBLIOGRAPHY_ORDER: z.enum(BIBLIOGRAPHY_ORDERS).default("input"),
	YEAR_UPPER_SLACK: z.coerce.number().int().min(0).default(0),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	const result = ConfigSchema.safeParse(env);
	if (!result.success) {
		const message = `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`;
		logger.error(message);
		throw new Error(message);
	}
	return result.data;
}
