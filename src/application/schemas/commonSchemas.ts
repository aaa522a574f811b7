import { z } from "zod";

export const featureIdSchema = z.string().min(1).describe("The ID of the feature.");
export const sessionIdSchema = z.string().min(1).describe("The agent session ID.");
export const featureStatusSchema = z.enum(['pending', 'in-progress', 'completed']).describe("Feature status");
export const summarySchema = z.string().min(1).describe("Summary text");
export const commitHashSchema = z.string().min(1).describe("Commit hash");
export const filesChangedSchema = z.array(z.string()).describe("Paths of files changed");
export const lineCountSchema = z.number().int().min(1).max(1000).describe("Number of lines to return");
export const tokenCountSchema = z.number().int().min(0).describe("Token count");
