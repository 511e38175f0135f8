import { z } from "zod";

const OutputFormatSchema = z.enum(["text", "json"]);

export const ConfigSchema = z.object({
	scale: z.number().int().min(0).max(19).default(0),
	format: z.string().min(1).default("%v"),
	output: OutputFormatSchema.default("text"),
	interactive: z.boolean().default(true),
});

export type Dec19Config = z.infer<typeof ConfigSchema>;
