import * as path from 'path';

/**
 * Sanitization utilities for CLI input validation
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Validates numeric inputs
 */
export function sanitizeNumber(
  value: string,
  fieldName: string,
  min?: number,
  max?: number
): number {
  if (!value || typeof value !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  if (!/^-?\d+$/.test(value.trim())) {
    throw new ValidationError(`${fieldName} must be a valid number`);
  }

  const num = parseInt(value, 10);

  if (min !== undefined && num < min) {
    throw new ValidationError(`${fieldName} must be at least ${min}`);
  }

  if (max !== undefined && num > max) {
    throw new ValidationError(`${fieldName} cannot exceed ${max}`);
  }

  return num;
}

/**
 * Trims a required string field and bounds its length
 */
function requireText(
  value: string,
  fieldName: string,
  maxLength: number
): string {
  if (!value || typeof value !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = value.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  if (trimmed.length > maxLength) {
    throw new ValidationError(
      `${fieldName} cannot exceed ${maxLength} characters`
    );
  }

  return trimmed;
}

/**
 * Validates and resolves file paths (key files, templates)
 */
export function sanitizeFilePath(filePath: string, fieldName: string): string {
  const trimmed = requireText(filePath, fieldName, 500);

  if (trimmed.includes('\0')) {
    throw new ValidationError(`${fieldName} contains null bytes`);
  }

  const resolved = path.resolve(trimmed);

  if (resolved.length > 500) {
    throw new ValidationError(`${fieldName} path is too long`);
  }

  return resolved;
}

/**
 * Validates the remote host; the port is fixed at 22, so "host:port" is rejected
 */
export function sanitizeSSHHost(host: string): string {
  const trimmed = requireText(host, 'SSH host', 253);

  if (!/^[a-zA-Z0-9.-]+$/.test(trimmed)) {
    throw new ValidationError(
      'SSH host must be a valid hostname or IP address'
    );
  }

  return trimmed;
}

/**
 * Validates the login user of the remote host
 */
export function sanitizeSSHUsername(username: string): string {
  const trimmed = requireText(username, 'SSH username', 32);

  if (!/^[a-z_][a-z0-9_-]*$/.test(trimmed)) {
    throw new ValidationError('SSH username must be a valid Unix username');
  }

  return trimmed;
}

/**
 * Validates container image references such as registry/repo:tag
 */
export function sanitizeImageReference(image: string): string {
  const trimmed = requireText(image, 'Image', 255);

  if (!/^[a-zA-Z0-9][a-zA-Z0-9._\/:@-]*$/.test(trimmed)) {
    throw new ValidationError(
      'Image can only contain letters, numbers, dots, slashes, colons, @, hyphens, and underscores'
    );
  }

  return trimmed;
}

/**
 * Joins a repository and tag into an image reference
 */
export function imageReference(repo: string, tag?: string): string {
  const image = sanitizeImageReference(repo);
  if (!tag) {
    return image;
  }
  return sanitizeImageReference(`${image}:${tag.trim()}`);
}

/**
 * Parses KEY=VALUE pairs into template parameters
 */
export function sanitizeParams(pairs: string[]): Record<string, string> {
  if (!Array.isArray(pairs)) {
    throw new ValidationError('Parameters must be an array');
  }

  const params: Record<string, string> = {};

  for (const pair of pairs) {
    const separator = pair.indexOf('=');
    if (separator <= 0) {
      throw new ValidationError(`Parameter must look like KEY=VALUE: ${pair}`);
    }

    const key = pair.slice(0, separator).trim();
    const value = pair.slice(separator + 1);

    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
      throw new ValidationError(`Invalid parameter name: ${key}`);
    }

    if (key === 'Image') {
      throw new ValidationError(
        'Image is set from --image or --image-repo/--image-tag, not --param'
      );
    }

    if (value.includes('\0')) {
      throw new ValidationError(`Parameter contains null bytes: ${key}`);
    }

    params[key] = value;
  }

  return params;
}
