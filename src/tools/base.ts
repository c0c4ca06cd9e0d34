import { ConfigurationError } from '../errors/syncErrors.js';
import { SiteValidator } from '../utils/validation.js';

/**
 * Per-call context handed to tools by the server
 */
export interface ToolContext {
  /** Aborted when the client cancels the request */
  signal?: AbortSignal;
  /** Present when the client asked for progress notifications */
  sendProgress?: (progress: number, total: number, message: string) => Promise<void>;
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, object>;
  required?: string[];
  additionalProperties?: boolean;
  /** Usage hints for model clients; ignored by schema validators */
  llmGuidance?: Record<string, string | string[]>;
}

export interface ToolAnnotations {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

/**
 * Base class for site sync tools
 *
 * ```typescript
 * export class MyTool extends BaseTool {
 *   public name = 'my_tool';
 *   public description = 'Tool description';
 *   public inputSchema: ToolInputSchema = { type: 'object', properties: { ... } };
 *
 *   async execute(params: Record<string, unknown>, context: ToolContext) {
 *     const siteId = this.validate.siteId(params.siteId, 'my operation');
 *     ...
 *   }
 * }
 * ```
 */
export abstract class BaseTool {
  /** Tool name as registered with MCP server (must be unique) */
  public abstract name: string;

  public abstract description: string;

  public abstract inputSchema: ToolInputSchema;

  public annotations?: ToolAnnotations;

  /**
   * Run the tool. Input arrives unvalidated from the client.
   */
  abstract execute(params: Record<string, unknown>, context: ToolContext): Promise<unknown>;

  /**
   * Input validation helpers; each throws ConfigurationError
   */
  protected validate = {
    siteId: (value: unknown, operation: string): string => {
      const result = SiteValidator.validateParameter({
        field: 'siteId',
        value,
        required: true,
        type: 'string',
        minLength: 1
      });
      if (!result.isValid || typeof value !== 'string') {
        throw new ConfigurationError(`${operation}: ${result.errors.join('; ')}`, 'siteId');
      }
      return value.trim();
    },

    enum: <T extends string>(value: unknown, field: string, allowed: readonly T[], fallback?: T): T => {
      if (value === undefined && fallback !== undefined) {
        return fallback;
      }
      const match = allowed.find(candidate => candidate === value);
      if (match === undefined) {
        throw new ConfigurationError(`${field} must be one of: ${allowed.join(', ')}`, field);
      }
      return match;
    },

    stringArray: (value: unknown, field: string): string[] | undefined => {
      if (value === undefined) {
        return undefined;
      }
      if (!Array.isArray(value) || !value.every((entry): entry is string => typeof entry === 'string')) {
        throw new ConfigurationError(`${field} must be a list of strings`, field);
      }
      return value;
    },

    timestamp: (value: unknown, field: string): Date => SiteValidator.parseTimestamp(value, field)
  };
}
