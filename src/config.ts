import * as path from 'path';
import * as fs from 'fs';
import { config as dotenvConfig } from 'dotenv';
import { AppConfig, IConfigManager } from './types';
import { cacheDir, configDir, errorMessage, isLogLevel, logger } from './utils';

dotenvConfig();

type ConfigValue = string | number | boolean;

const numericKeys = ['connectTimeout', 'pollInterval', 'commandTimeout', 'connectivityTimeout'] as const;
const booleanKeys = ['skipConnectivityCheck', 'incidentLog'] as const;
const stringKeys = ['mullvadBin', 'homeLocationFile', 'connectivityCheckUrl', 'logsDir'] as const;

type NumericKey = typeof numericKeys[number];
type BooleanKey = typeof booleanKeys[number];
type StringKey = typeof stringKeys[number];

const isNumericKey = (key: string): key is NumericKey => numericKeys.some(candidate => candidate === key);
const isBooleanKey = (key: string): key is BooleanKey => booleanKeys.some(candidate => candidate === key);
const isStringKey = (key: string): key is StringKey => stringKeys.some(candidate => candidate === key);

export function defaultConfig(): AppConfig {
    return {
        // mullvad CLI
        mullvadBin: 'mullvad',
        homeLocationFile: path.join(cacheDir(), 'mullvad', 'home.loc'),
        commandTimeout: 10000,

        // Connection waiting
        connectTimeout: 15000,
        pollInterval: 500,

        // Preflight
        connectivityCheckUrl: 'https://1.1.1.1',
        connectivityTimeout: 2000,
        skipConnectivityCheck: false,

        // Logging
        logLevel: 'info',
        logsDir: path.join(cacheDir(), 'relaycycle'),
        incidentLog: true
    };
}

/**
 * Loads and validates configuration.
 * Priority: environment variables > config file > defaults.
 */
export class ConfigManager implements IConfigManager {
    private config: AppConfig;

    constructor(
        private readonly env: NodeJS.ProcessEnv = process.env,
        private readonly searchDirs: string[] = [process.cwd(), path.join(configDir(), 'relaycycle')]
    ) {
        this.config = defaultConfig();
    }

    load(): AppConfig {
        this.config = defaultConfig();

        this.loadFromFile();
        this.loadFromEnv();

        this.validate();

        return this.config;
    }

    private loadFromEnv(): void {
        const envMapping: Record<string, keyof AppConfig> = {
            'MULLVAD_BIN': 'mullvadBin',
            'HOME_LOCATION_FILE': 'homeLocationFile',
            'CONNECT_TIMEOUT': 'connectTimeout',
            'POLL_INTERVAL': 'pollInterval',
            'COMMAND_TIMEOUT': 'commandTimeout',
            'CONNECTIVITY_CHECK_URL': 'connectivityCheckUrl',
            'CONNECTIVITY_TIMEOUT': 'connectivityTimeout',
            'SKIP_CONNECTIVITY_CHECK': 'skipConnectivityCheck',
            'LOG_LEVEL': 'logLevel',
            'LOGS_DIR': 'logsDir',
            'INCIDENT_LOG': 'incidentLog'
        };

        Object.entries(envMapping).forEach(([envKey, configKey]) => {
            const envValue = this.env[envKey];
            if (envValue !== undefined && envValue !== '') {
                this.assign(this.config, configKey, this.parseValue(envValue));
            }
        });
    }

    /**
     * First existing file wins: relaycycle.json, then .relaycyclerc (key=value)
     */
    private loadFromFile(): void {
        const configPaths = this.searchDirs.flatMap(dir => [
            path.join(dir, 'relaycycle.json'),
            path.join(dir, '.relaycyclerc')
        ]);

        for (const configPath of configPaths) {
            if (!fs.existsSync(configPath)) {
                continue;
            }

            try {
                const fileContent = fs.readFileSync(configPath, 'utf8');
                const fileConfig = configPath.endsWith('.json')
                    ? this.parseJsonFile(fileContent)
                    : this.parseRcFile(fileContent);

                // A rejected key discards the whole file
                const staged = { ...this.config };
                Object.entries(fileConfig).forEach(([key, value]) => this.assign(staged, key, value));
                this.config = staged;
            } catch (error) {
                logger.warn(`Failed to load config from ${configPath}:`, errorMessage(error));
            }
            break;
        }
    }

    private assign(target: AppConfig, key: string, value: ConfigValue): void {
        if (isNumericKey(key)) {
            target[key] = typeof value === 'number' ? value : Number.NaN;
        } else if (isBooleanKey(key)) {
            target[key] = value === true || value === 1;
        } else if (isStringKey(key)) {
            target[key] = String(value);
        } else if (key === 'logLevel') {
            if (!isLogLevel(value)) {
                throw new Error(`Config logLevel must be one of: error, warn, info, debug`);
            }
            target.logLevel = value;
        } else {
            logger.debug(`Ignoring unknown config key: ${key}`);
        }
    }

    private parseValue(value: string): ConfigValue {
        if (value === 'true') return true;
        if (value === 'false') return false;

        if (/^\d+$/.test(value)) {
            return parseInt(value, 10);
        }

        return value;
    }

    private parseJsonFile(content: string): Record<string, ConfigValue> {
        const parsed: unknown = JSON.parse(content);
        if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
            throw new Error('Config file must contain a JSON object');
        }

        const config: Record<string, ConfigValue> = {};
        for (const [key, value] of Object.entries(parsed)) {
            if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
                config[key] = value;
            }
        }
        return config;
    }

    private parseRcFile(content: string): Record<string, ConfigValue> {
        const config: Record<string, ConfigValue> = {};
        const lines = content.split('\n');

        lines.forEach(line => {
            line = line.trim();
            if (line && !line.startsWith('#')) {
                const [key, ...valueParts] = line.split('=');
                if (key && valueParts.length > 0) {
                    const value = valueParts.join('=').trim();
                    config[key.trim()] = this.parseValue(value);
                }
            }
        });

        return config;
    }

    private validate(): void {
        const minimums: Record<NumericKey, number> = {
            connectTimeout: 1,
            pollInterval: 1,
            commandTimeout: 1,
            connectivityTimeout: 1
        };

        numericKeys.forEach(key => {
            const value = this.config[key];
            if (!Number.isFinite(value)) {
                throw new Error(`Config ${key} must be a valid number`);
            }
            if (value < minimums[key]) {
                throw new Error(`Config ${key} must be at least ${minimums[key]}`);
            }
        });

        if (this.config.pollInterval > this.config.connectTimeout) {
            throw new Error('Config pollInterval must not exceed connectTimeout');
        }

        if (!this.config.mullvadBin) {
            throw new Error('Config mullvadBin must not be empty');
        }
    }
}

export const configManager = new ConfigManager();
export default configManager;
