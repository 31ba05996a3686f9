export { getDefaultWorkerCount, getNodeEnv, getOutputSuffix, isProduction, isTest, resetEnvCache } from './config.js';
