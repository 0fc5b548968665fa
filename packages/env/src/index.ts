export {
  getAppConfig,
  getNodeEnv,
  isDevelopment,
  loadAppConfig,
  resetAppConfig,
  type AppConfig,
} from './config.js';
