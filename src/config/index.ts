export { validateEnv, buildConfig } from './env.js';
export type { ValidatedEnv, AppConfig, InputBackend } from './env.js';
