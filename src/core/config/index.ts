/**
 * Core configuration module for stackplan
 *
 * @description Environment-driven configuration: region, engine selection, state and plan paths,
 * Pulumi backend settings. Loaded once and passed explicitly to every evaluation step.
 */

export { CoreConfigSchema, PulumiConfigSchema } from './interface'
export type { CoreConfig, CoreConfigInput } from './interface'
export { ConfigLoader, DEFAULT_CORE_CONFIG, type Environment } from './default'
