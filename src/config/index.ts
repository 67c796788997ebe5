/**
 * @entry Config 配置模块
 *
 * 加载 .perfgate.yaml、Schema 校验、环境变量覆盖
 */

export {
  CONFIG_FILENAME,
  loadConfig,
  getDefaultConfig,
  clearConfigCache,
  applyEnvOverrides,
} from './loadConfig.js'
export * from './schema.js'
