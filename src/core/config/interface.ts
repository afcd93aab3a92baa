import { z } from "zod"
import { ReadonlyDeep } from "type-fest"
import { SUPPORTED_ENGINES } from "../const"
import { ErrorEnvironment } from "../errors/taxonomy"
import { CORE_VALIDATION_PATTERNS } from "../validation/patterns"

export const PulumiConfigSchema = z.object({
    projectName: z.string().min(1).describe("Pulumi project name"),
    stackName: z.string().min(1).describe("Pulumi stack name"),
    backendUrl: z.string().min(1).describe("Pulumi state backend URL, eg. file:///path or s3://bucket"),
    passphrase: z.string().optional().describe("Secrets passphrase for passphrase-based stacks"),
    commandRoot: z.string().optional().describe("Directory holding a pinned Pulumi CLI. Uses PATH when unset."),
    awsPluginVersion: z.string().min(1).describe("AWS resource plugin version installed on init"),
})

export const CoreConfigSchema = z.object({
    region: z.string()
        .regex(CORE_VALIDATION_PATTERNS.AWS_REGION, "Invalid AWS region")
        .optional()
        .describe("Region from the environment. Overrides the declaration's region parameter default."),
    workDir: z.string().min(1).describe("Directory plan, state and artifacts paths resolve against"),
    stateFile: z.string().min(1).describe("Recorded state used by the local engine"),
    planFile: z.string().min(1).describe("Default plan output path"),
    artifactsDir: z.string().min(1).describe("Where pipeline jobs keep their artifacts"),
    engine: z.enum(SUPPORTED_ENGINES),
    environment: z.nativeEnum(ErrorEnvironment),
    logLevel: z.number().int().min(0).max(6),
    pulumi: PulumiConfigSchema,
})

export type CoreConfigInput = z.infer<typeof CoreConfigSchema>

/**
 * Configuration built once at startup and passed to every step. Never mutated.
 */
export type CoreConfig = ReadonlyDeep<CoreConfigInput>
