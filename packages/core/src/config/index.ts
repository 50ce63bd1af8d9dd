export {
  EngineConfigSchema,
  ConfigFileSchema,
  ConfigEnvSchema,
  type EngineConfig,
  type EngineConfigInput,
  type ConfigFile,
  type ConfigEnv,
} from './schema.js'
export { loadConfig, createConfig, type LoadConfigOptions } from './loader.js'
