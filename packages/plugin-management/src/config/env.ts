import { ConfigError } from './errors.js';

/**
 * Set an environment variable on the given environment record.
 * Blank values are ignored so callers can forward optional settings unconditionally.
 */
export function setEnvVariable(
    key: string,
    value: string,
    env: NodeJS.ProcessEnv = process.env
): void {
    if (value.trim() === '') {
        return;
    }
    if (key.trim() === '' || key.includes('=') || key.includes('\0')) {
        throw ConfigError.invalidEnvKey(key);
    }
    env[key] = value;
}
