import type { z } from "zod";
import type {
	fixableWhenSchema,
	gateSchema,
	jsonViolationsParsingSchema,
	parsingConfigSchema,
	qualityConfigSchema,
	severitySchema,
	textViolationsParsingSchema,
	VIOLATION_FIELDS,
} from "./schema.js";

export type QualityConfig = z.infer<typeof qualityConfigSchema>;
export type GateConfig = z.infer<typeof gateSchema>;
export type ParsingConfig = z.infer<typeof parsingConfigSchema>;
export type JsonViolationsParsing = z.infer<typeof jsonViolationsParsingSchema>;
export type TextViolationsParsing = z.infer<typeof textViolationsParsingSchema>;
export type FixableWhen = z.infer<typeof fixableWhenSchema>;
export type Severity = z.infer<typeof severitySchema>;
export type ViolationField = (typeof VIOLATION_FIELDS)[number];

/** A gate definition paired with its catalog id. */
export interface ActiveGate {
	id: string;
	config: GateConfig;
}

// Combined type for the fully loaded configuration
export interface LoadedConfig {
	rootDir: string;
	configPath: string;
	quality: QualityConfig;
}
