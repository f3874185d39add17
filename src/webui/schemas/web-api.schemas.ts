/**
 * @fileoverview Zod validation schemas for HTTP API requests and WebSocket commands.
 *
 * Every body and query string is parsed here before a route touches the
 * backend. Query values arrive as strings, so numeric query fields coerce.
 *
 * Key exports:
 * - WebSocket schemas: WebSocketCommandSchema, WebSocketCommandTypeSchema
 * - Print control: PrintStartRequestSchema
 * - Motion: MoveRequestSchema, MoveDeltaRequestSchema
 * - Files: FileListQuerySchema, FilePathQuerySchema, ThumbnailQuerySchema
 * - Status: StatusResetRequestSchema
 * - Helper functions: createValidationError, firstIssueMessage
 */

import { z } from 'zod';

// ============================================================================
// WEBSOCKET MESSAGE SCHEMAS
// ============================================================================

export const WebSocketCommandTypeSchema = z.enum(['REQUEST_STATUS', 'PING']);

export const WebSocketCommandSchema = z.object({
  command: WebSocketCommandTypeSchema,
});

// ============================================================================
// SHARED FIELDS
// ============================================================================

export const FileLocationSchema = z.enum(['Local', 'Usb']);

const filePathSchema = z.string().trim().min(1, 'filePath is required');

// ============================================================================
// PRINT CONTROL
// ============================================================================

export const PrintStartRequestSchema = z.object({
  location: FileLocationSchema.optional(),
  filePath: filePathSchema,
});

// ============================================================================
// MOTION
// ============================================================================

/** Absolute Z target in mm */
export const MoveRequestSchema = z.object({
  height: z.number().finite().min(0, 'height must not be negative').max(500),
});

/** Relative Z move in mm; positive is up */
export const MoveDeltaRequestSchema = z.object({
  delta: z.number().finite().min(-500).max(500),
});

export const CureRequestSchema = z.object({
  cure: z.boolean(),
});

// ============================================================================
// FILES
// ============================================================================

export const FileListQuerySchema = z.object({
  location: FileLocationSchema.optional(),
  subdirectory: z.string().optional().default(''),
  pageIndex: z.coerce.number().int().min(0).optional().default(0),
  pageSize: z.coerce.number().int().min(1).max(500).optional().default(100),
});

export const FilePathQuerySchema = z.object({
  location: FileLocationSchema.optional(),
  filePath: filePathSchema,
});

export const ThumbnailQuerySchema = FilePathQuerySchema.extend({
  size: z.enum(['Small', 'Large']).optional().default('Large'),
  lastModified: z.coerce.number().int().min(0).optional(),
});

// ============================================================================
// STATUS
// ============================================================================

export const StatusRefreshRequestSchema = z
  .object({
    force: z.boolean().optional().default(true),
  })
  .default({});

export const StatusResetRequestSchema = z
  .object({
    /** Show this file's cached thumbnail while the next print loads */
    filePath: z.string().min(1).optional(),
    location: FileLocationSchema.optional(),
  })
  .default({});

// ============================================================================
// ANALYTICS
// ============================================================================

export const AnalyticsKeyParamsSchema = z.object({
  key: z.string().regex(/^[A-Za-z0-9_]+$/, 'Invalid metric key'),
});

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Create a validation error response body
 */
export function createValidationError(zodError: z.ZodError): { error: string; details: unknown } {
  const issues = zodError.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));

  return {
    error: 'Validation failed',
    details: issues,
  };
}

export function firstIssueMessage(zodError: z.ZodError): string {
  const issue = zodError.issues[0];
  if (!issue) {
    return 'Invalid request';
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}
