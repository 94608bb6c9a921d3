import os from 'node:os';
import path from 'node:path';

export const baseDir = process.env.RANDINDEX_HOME ?? path.join(os.homedir(), '.randindex');
export const configPath = path.join(baseDir, 'config.json');
export const checkpointPath = path.join(baseDir, 'checkpoint.json');
export const logsDir = process.env.RANDINDEX_LOG_DIR ?? path.join(baseDir, 'logs');
