export { AppConfigSchema, createAppConfig, type AppConfig, type ConfigOverrides } from './app-config';
export * from './defaults';
