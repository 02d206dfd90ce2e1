import fs from 'fs';
import Ajv, { AnySchema, ErrorObject, ValidateFunction } from 'ajv';
import { parse as parseYAML } from 'yaml';
import { TelemetryConfiguration, TelemetryConfigurationOptions } from './configuration';
import { ConfigError, isTelemetryError } from '../errors/types';
import { Logger, logger as defaultLogger } from '../logger';
import { resolvePackagePath } from '../utils/packageRoot';

export interface LoadOptions {
  /** Path to the configuration YAML file. Default: $TELEMETRY_CONFIG, else no file */
  filePath?: string;
  /** Path to the JSON schema file. Default: schema/telemetry-config.schema.json */
  schemaPath?: string;
  /** Environment used for overrides. Default: process.env */
  env?: NodeJS.ProcessEnv;
}

export const ENV_CONFIG_FILE = 'TELEMETRY_CONFIG';
export const ENV_COLLECTION_ENABLED = 'TELEMETRY_COLLECTION_ENABLED';
export const ENV_UPLOAD_ENABLED = 'TELEMETRY_UPLOAD_ENABLED';
export const ENV_MAX_EVENTS_PER_PING = 'TELEMETRY_MAX_EVENTS_PER_PING';

function formatSchemaErrors(errors: ErrorObject[]): string {
  return errors
    .map(e => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
    .join('; ');
}

function parseBooleanFlag(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case '1':
    case 'true':
      return true;
    case '0':
    case 'false':
      return false;
    default:
      throw new ConfigError(`${name} must be one of 1, 0, true, false (got '${raw}')`);
  }
}

function parsePositiveInteger(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${name} must be a positive integer (got '${raw}')`);
  }
  return value;
}

/**
 * Loads a {@link TelemetryConfiguration} from YAML and environment overrides
 */
export class ConfigurationLoader {
  private ajv: Ajv;
  private readonly logger: Logger;
  private readonly validators = new Map<string, ValidateFunction<TelemetryConfigurationOptions>>();

  constructor(logger: Logger = defaultLogger) {
    this.ajv = new Ajv({ allErrors: true, strict: false });
    this.logger = logger;
  }

  load(options: LoadOptions = {}): TelemetryConfiguration {
    const env = options.env ?? process.env;
    const filePath = options.filePath ?? env[ENV_CONFIG_FILE];

    const fromFile = filePath ? this.readFile(filePath, options.schemaPath) : {};
    const merged: TelemetryConfigurationOptions = { ...fromFile, ...this.readEnv(env) };

    try {
      return new TelemetryConfiguration(merged);
    } catch (error) {
      if (isTelemetryError(error)) {
        throw new ConfigError(`Invalid telemetry configuration: ${error.message}`, filePath, { cause: error });
      }
      throw error;
    }
  }

  private readFile(filePath: string, schemaPath?: string): TelemetryConfigurationOptions {
    let rawYaml: string;
    try {
      if (!fs.existsSync(filePath)) {
        throw new Error(`Configuration file not found: ${filePath}`);
      }
      rawYaml = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
      throw new ConfigError(
        `Failed to read telemetry configuration from ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        filePath
      );
    }

    let data: unknown;
    try {
      data = parseYAML(rawYaml);
    } catch (error) {
      throw new ConfigError(
        `Failed to parse telemetry configuration YAML: ${error instanceof Error ? error.message : String(error)}`,
        filePath
      );
    }

    // An empty document means "all defaults"
    if (data === null || data === undefined) {
      return {};
    }

    const validate = this.getValidator(schemaPath);
    if (!validate) {
      if (typeof data !== 'object' || Array.isArray(data)) {
        throw new ConfigError('Telemetry configuration must be a mapping', filePath);
      }
      return { ...data };
    }

    if (!validate(data)) {
      const errors = validate.errors ?? [];
      throw new ConfigError(
        `Telemetry configuration failed schema validation: ${formatSchemaErrors(errors)}`,
        filePath,
        { details: { errors } }
      );
    }
    return data;
  }

  private getValidator(schemaPath?: string): ValidateFunction<TelemetryConfigurationOptions> | undefined {
    const resolved = schemaPath ?? resolvePackagePath('schema', 'telemetry-config.schema.json');

    // Schema validation is optional - proceed without it if the file is missing
    if (!fs.existsSync(resolved)) {
      this.logger.warn(`Telemetry configuration schema not found at ${resolved}, skipping validation`);
      return undefined;
    }

    const cached = this.validators.get(resolved);
    if (cached) {
      return cached;
    }

    const schema: AnySchema = JSON.parse(fs.readFileSync(resolved, 'utf8'));
    const validate = this.ajv.compile<TelemetryConfigurationOptions>(schema);
    this.validators.set(resolved, validate);
    return validate;
  }

  private readEnv(env: NodeJS.ProcessEnv): TelemetryConfigurationOptions {
    const overrides: TelemetryConfigurationOptions = {};

    const collection = env[ENV_COLLECTION_ENABLED];
    if (collection !== undefined && collection !== '') {
      overrides.collectionEnabled = parseBooleanFlag(ENV_COLLECTION_ENABLED, collection);
    }

    const upload = env[ENV_UPLOAD_ENABLED];
    if (upload !== undefined && upload !== '') {
      overrides.uploadEnabled = parseBooleanFlag(ENV_UPLOAD_ENABLED, upload);
    }

    const maxEvents = env[ENV_MAX_EVENTS_PER_PING];
    if (maxEvents !== undefined && maxEvents !== '') {
      overrides.maximumNumberOfEventsPerPing = parsePositiveInteger(ENV_MAX_EVENTS_PER_PING, maxEvents);
    }

    return overrides;
  }
}

export const defaultConfigurationLoader = new ConfigurationLoader();
