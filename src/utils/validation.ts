/**
 * Validation for site profiles and tool input.
 *
 * Rules describe one field each; results collect every problem so a config
 * file with several mistakes is reported in one pass.
 */

import path from 'path';
import { ConfigurationError } from '../errors/syncErrors.js';
import { DEFAULT_EXCLUSIONS, isWellFormedGlob } from './exclusionMatcher.js';
import { AuthMethod, SiteProfile } from '../sync/types.js';

export interface ValidationRule {
  field: string;
  value: unknown;
  required?: boolean;
  type?: 'string' | 'number' | 'boolean' | 'array' | 'object';
  minLength?: number;
  pattern?: RegExp;
  enum?: readonly string[];
  min?: number;
  max?: number;
  integer?: boolean;
  /** Returns an error message, or null if valid */
  customValidator?: (value: unknown) => string | null;
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

export interface ProfileValidation {
  profile: SiteProfile;
  /** Non-fatal findings, e.g. exclusion rules that will match literally */
  warnings: string[];
}

const SITE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const AUTH_METHODS: readonly AuthMethod[] = ['password', 'key'];

function isEmpty(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

function typeMatches(value: unknown, type: NonNullable<ValidationRule['type']>): boolean {
  switch (type) {
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    default:
      return typeof value === type;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeMatches(value, 'object');
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(entry => typeof entry === 'string');
}

export class SiteValidator {
  /**
   * Validate a single value against a rule
   */
  static validateParameter(rule: ValidationRule): ValidationResult {
    const { field, value, required = false } = rule;

    if (isEmpty(value)) {
      return required
        ? { isValid: false, errors: [`${field} is required`] }
        : { isValid: true, errors: [] };
    }

    const errors: string[] = [];

    if (rule.type && !typeMatches(value, rule.type)) {
      errors.push(`${field} must be of type ${rule.type}, got ${Array.isArray(value) ? 'array' : typeof value}`);
      return { isValid: false, errors };
    }

    if (typeof value === 'string') {
      if (rule.minLength !== undefined && value.trim().length < rule.minLength) {
        errors.push(`${field} must be at least ${rule.minLength} characters long`);
      }
      if (rule.pattern && !rule.pattern.test(value)) {
        errors.push(`${field} format is invalid`);
      }
      if (rule.enum && !rule.enum.includes(value)) {
        errors.push(`${field} must be one of: ${rule.enum.join(', ')}`);
      }
    }

    if (typeof value === 'number') {
      if (rule.integer && !Number.isInteger(value)) {
        errors.push(`${field} must be an integer`);
      }
      if (rule.min !== undefined && value < rule.min) {
        errors.push(`${field} must be at least ${rule.min}`);
      }
      if (rule.max !== undefined && value > rule.max) {
        errors.push(`${field} must be at most ${rule.max}`);
      }
    }

    if (rule.customValidator) {
      const customError = rule.customValidator(value);
      if (customError) {
        errors.push(customError);
      }
    }

    return { isValid: errors.length === 0, errors };
  }

  /**
   * Validate several rules, collecting every error
   */
  static validateAll(rules: ValidationRule[]): ValidationResult {
    const errors = rules.flatMap(rule => SiteValidator.validateParameter(rule).errors);
    return { isValid: errors.length === 0, errors };
  }

  /**
   * Turn an untrusted config entry into a SiteProfile
   *
   * @throws ConfigurationError listing every problem found
   */
  static validateSiteProfile(raw: unknown, where: string = 'site'): ProfileValidation {
    if (!isObject(raw)) {
      throw new ConfigurationError(`${where} must be an object`, where);
    }

    const connection = isObject(raw.connection) ? raw.connection : {};
    const label = typeof raw.id === 'string' && raw.id ? `site "${raw.id}"` : where;

    const result = SiteValidator.validateAll([
      { field: 'id', value: raw.id, required: true, type: 'string', pattern: SITE_ID_PATTERN },
      { field: 'name', value: raw.name, type: 'string' },
      {
        field: 'localRoot', value: raw.localRoot, required: true, type: 'string',
        customValidator: value => typeof value === 'string' && !path.isAbsolute(value)
          ? 'localRoot must be an absolute path' : null
      },
      {
        field: 'remoteRoot', value: raw.remoteRoot, required: true, type: 'string',
        customValidator: value => typeof value === 'string' && (!value.startsWith('/') || value.includes('\0'))
          ? 'remoteRoot must be an absolute POSIX path' : null
      },
      { field: 'connection', value: raw.connection, required: true, type: 'object' },
      { field: 'connection.host', value: connection.host, required: isObject(raw.connection), type: 'string', minLength: 1 },
      { field: 'connection.port', value: connection.port, type: 'number', integer: true, min: 1, max: 65535 },
      { field: 'connection.username', value: connection.username, required: isObject(raw.connection), type: 'string', minLength: 1 },
      { field: 'connection.auth', value: connection.auth, type: 'string', enum: AUTH_METHODS },
      { field: 'connection.readyTimeoutMs', value: connection.readyTimeoutMs, type: 'number', min: 1 },
      {
        field: 'exclusions', value: raw.exclusions, type: 'array',
        customValidator: value => isStringArray(value) ? null : 'exclusions must contain only strings'
      },
      {
        field: 'pullScopes', value: raw.pullScopes, type: 'array',
        customValidator: value => isStringArray(value) ? null : 'pullScopes must contain only strings'
      },
      { field: 'mirrorDeletions', value: raw.mirrorDeletions, type: 'boolean' }
    ]);

    if (!result.isValid) {
      throw new ConfigurationError(`Invalid ${label}: ${result.errors.join('; ')}`, where, { errors: result.errors });
    }

    // Narrowed by the rules above; re-checked here for the compiler
    const auth = AUTH_METHODS.find(method => method === connection.auth) ?? 'password';
    const exclusions = isStringArray(raw.exclusions) ? raw.exclusions : [...DEFAULT_EXCLUSIONS];
    const pullScopes = isStringArray(raw.pullScopes) ? raw.pullScopes : [];

    const warnings = exclusions
      .filter(rule => !isWellFormedGlob(rule))
      .map(rule => `${label}: exclusion rule "${rule}" is not a valid glob and will only match literally`);

    const profile: SiteProfile = Object.freeze({
      id: String(raw.id),
      name: typeof raw.name === 'string' ? raw.name : undefined,
      localRoot: path.resolve(String(raw.localRoot)),
      remoteRoot: normalizeRemoteRoot(String(raw.remoteRoot)),
      connection: Object.freeze({
        host: String(connection.host),
        port: typeof connection.port === 'number' ? connection.port : 22,
        username: String(connection.username),
        auth,
        readyTimeoutMs: typeof connection.readyTimeoutMs === 'number' ? connection.readyTimeoutMs : undefined
      }),
      exclusions: Object.freeze([...exclusions]),
      pullScopes: Object.freeze([...pullScopes]),
      mirrorDeletions: raw.mirrorDeletions === true
    });

    return { profile, warnings };
  }

  /**
   * Accept an ISO-8601 string or epoch milliseconds
   *
   * @throws ConfigurationError
   */
  static parseTimestamp(value: unknown, field: string): Date {
    if (typeof value === 'number' && Number.isFinite(value)) {
      return new Date(value);
    }
    if (typeof value === 'string' && value.trim().length > 0) {
      const trimmed = value.trim();
      const parsed = /^\d+$/.test(trimmed) ? new Date(Number(trimmed)) : new Date(trimmed);
      if (!Number.isNaN(parsed.getTime())) {
        return parsed;
      }
    }
    throw new ConfigurationError(`${field} must be an ISO-8601 timestamp or epoch milliseconds`, field);
  }
}

/**
 * Normalize a remote root: collapse '..' and duplicate slashes, drop trailing '/'
 */
export function normalizeRemoteRoot(remoteRoot: string): string {
  const normalized = path.posix.normalize(remoteRoot);
  return normalized.length > 1 ? normalized.replace(/\/+$/, '') : normalized;
}
