/**
 * Base interface and class for MCP tool handlers
 */
import type { z } from 'zod';
import type { McpToolResponse } from '../tool-types.js';
import { ValidationError, isDochiveError } from '../../../shared/domain/errors.js';

/**
 * Tool definition as used in MCP SDK
 */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, Record<string, unknown>>;
    required?: string[];
  };
}

/**
 * Base interface for all tool handlers
 */
export interface IToolHandler {
  getToolDefinitions(): ToolDefinition[];
  handleToolCall(name: string, args: unknown): Promise<McpToolResponse>;
}

/**
 * Base abstract class for all tool handlers
 */
export abstract class BaseToolHandler implements IToolHandler {
  /**
   * Get the definitions of all tools provided by this handler (Abstract)
   */
  abstract getToolDefinitions(): ToolDefinition[];

  /**
   * Handle a tool call (Abstract)
   */
  abstract handleToolCall(name: string, args: unknown): Promise<McpToolResponse>;

  /**
   * Whether this handler provides the named tool
   */
  handles(name: string): boolean {
    return this.getToolDefinitions().some(tool => tool.name === name);
  }

  /**
   * Validate tool arguments; missing arguments count as an empty object
   * @throws ValidationError listing every offending field
   */
  protected parseArgs<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
    const parsed = schema.safeParse(args ?? {});
    if (!parsed.success) {
      const problems = parsed.error.issues.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
      throw new ValidationError(`Invalid arguments: ${problems.join('; ')}`, { issues: parsed.error.issues });
    }
    return parsed.data;
  }

  /**
   * Create a standard success response
   */
  protected createSuccessResponse(text: string): McpToolResponse {
    return {
      content: [{ type: 'text', text }]
    };
  }

  /**
   * Create a structured error response with error type derived from the error object
   */
  protected createStructuredErrorResponse(error: unknown): McpToolResponse {
    let message = 'An unknown error occurred';
    let errorType = 'UnknownError';
    let errorCode = 'UNKNOWN';
    let details: Record<string, unknown> | undefined;

    if (isDochiveError(error)) {
      message = error.message;
      errorType = error.name;
      errorCode = error.errorCode;
      details = error.details;
    } else if (error instanceof Error) {
      message = error.message;
      errorType = error.name && error.name !== 'Error' ? error.name : 'GenericError';
      errorCode = 'GENERIC_ERROR';
    } else if (typeof error === 'string') {
      message = error;
      errorType = 'StringError';
      errorCode = 'STRING_ERROR';
    }

    return {
      isError: true,
      content: [{ type: 'text', text: message }],
      errorDetails: details ? { type: errorType, code: errorCode, details } : { type: errorType, code: errorCode }
    };
  }
}
