import * as path from 'path';
import * as fs from 'fs';
import { TaskName } from '../interfaces';

/**
 * Sanitization utilities for configuration and CLI input validation
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export const TASK_NAMES: readonly TaskName[] = [
  'deploy',
  'push',
  'update',
  'restart',
];

/**
 * Validates task names given on the command line
 */
export function sanitizeTaskName(name: string): TaskName {
  if (!name || typeof name !== 'string') {
    throw new ValidationError('Task name is required and must be a string');
  }

  const trimmed = name.trim();
  const task = TASK_NAMES.find((candidate) => candidate === trimmed);

  if (!task) {
    throw new ValidationError(
      `Unknown task "${trimmed}". Available tasks: ${TASK_NAMES.join(', ')}`
    );
  }

  return task;
}

/**
 * Validates supervised service names
 */
export function sanitizeServiceName(name: string): string {
  if (!name || typeof name !== 'string') {
    throw new ValidationError('Service name is required and must be a string');
  }

  const trimmed = name.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Service name cannot be empty');
  }

  if (trimmed.length > 100) {
    throw new ValidationError('Service name cannot exceed 100 characters');
  }

  // supervisor accepts group:name
  if (!/^[a-zA-Z0-9._:-]+$/.test(trimmed)) {
    throw new ValidationError(
      'Service name can only contain letters, numbers, dots, colons, hyphens, and underscores'
    );
  }

  return trimmed;
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

  const num = parseInt(value, 10);

  if (isNaN(num)) {
    throw new ValidationError(`${fieldName} must be a valid number`);
  }

  if (min !== undefined && num < min) {
    throw new ValidationError(`${fieldName} must be at least ${min}`);
  }

  if (max !== undefined && num > max) {
    throw new ValidationError(`${fieldName} cannot exceed ${max}`);
  }

  return num;
}

/**
 * Validates boolean flags such as `true`, `false`, `1`, `0`, `yes`, `no`
 */
export function sanitizeBoolean(value: string, fieldName: string): boolean {
  const normalized = value.trim().toLowerCase();

  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }

  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }

  throw new ValidationError(`${fieldName} must be true or false`);
}

/**
 * Validates and sanitizes file paths
 */
export function sanitizeFilePath(filePath: string, fieldName: string): string {
  if (!filePath || typeof filePath !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = filePath.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  const resolved = path.resolve(trimmed);

  if (resolved.length > 500) {
    throw new ValidationError(`${fieldName} path is too long`);
  }

  return resolved;
}

/**
 * Validates SSH key file path and permissions
 */
export function sanitizeSSHKeyPath(keyPath: string): string {
  const sanitized = sanitizeFilePath(keyPath, 'SSH key path');

  let stats: fs.Stats;
  try {
    stats = fs.statSync(sanitized);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ValidationError(`SSH key file does not exist: ${sanitized}`);
    }
    throw new ValidationError(`Cannot access SSH key file: ${error}`);
  }

  if (!stats.isFile()) {
    throw new ValidationError('SSH key path must point to a file');
  }

  // Check file permissions (should not be world-readable)
  const mode = stats.mode & parseInt('777', 8);
  if (mode & parseInt('044', 8)) {
    console.warn(
      'Warning: SSH key file is readable by others, consider changing permissions'
    );
  }

  return sanitized;
}

/**
 * Validates working directory paths
 */
export function sanitizeWorkingDir(workDir: string): string {
  if (!workDir || typeof workDir !== 'string') {
    throw new ValidationError('Working directory is required');
  }

  const trimmed = workDir.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Working directory cannot be empty');
  }

  if (trimmed.length > 500) {
    throw new ValidationError('Working directory path is too long');
  }

  // remote paths are always POSIX
  if (!path.posix.isAbsolute(trimmed)) {
    throw new ValidationError('Working directory must be an absolute path');
  }

  const dangerous = ['/etc', '/proc', '/sys', '/dev', '/boot'];
  for (const dir of dangerous) {
    if (trimmed === dir || trimmed.startsWith(`${dir}/`)) {
      throw new ValidationError(`Working directory cannot be in ${dir}`);
    }
  }

  return trimmed;
}

/**
 * Validates SSH hostnames/IPs
 */
export function sanitizeSSHHost(host: string): string {
  if (!host || typeof host !== 'string') {
    throw new ValidationError('SSH host is required');
  }

  const trimmed = host.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH host cannot be empty');
  }

  if (trimmed.length > 253) {
    throw new ValidationError('SSH host name is too long');
  }

  // Hostnames and SSH config aliases, IPv4 and IPv6 literals
  const hostnameRegex = /^[a-zA-Z0-9._-]+$/;
  const ipRegex =
    /^(?:(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.){3}(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)$/;
  const ipv6Regex = /^(?=.*:)[0-9a-fA-F:]+(?:%[a-zA-Z0-9]+)?$/;

  if (
    !hostnameRegex.test(trimmed) &&
    !ipRegex.test(trimmed) &&
    !ipv6Regex.test(trimmed)
  ) {
    throw new ValidationError(
      'SSH host must be a valid hostname or IP address'
    );
  }

  return trimmed;
}

/**
 * Validates SSH usernames
 */
export function sanitizeSSHUsername(username: string): string {
  if (!username || typeof username !== 'string') {
    throw new ValidationError('SSH username is required');
  }

  const trimmed = username.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH username cannot be empty');
  }

  if (trimmed.length > 32) {
    throw new ValidationError('SSH username cannot exceed 32 characters');
  }

  // Unix username validation
  if (!/^[a-z_][a-z0-9_-]*$/.test(trimmed)) {
    throw new ValidationError('SSH username must be a valid Unix username');
  }

  return trimmed;
}
