import fs from 'node:fs/promises';
import * as YAML from 'yaml';
import type { Capture } from './types';

export type ValidationSeverity = 'error' | 'warning';

export type ValidationError = {
  file: string;
  path: string;
  message: string;
  severity: ValidationSeverity;
  line?: number;
  column?: number;
};

export type ValidationResult = {
  capture?: Capture;
  errors: ValidationError[];
};

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

const isAbsoluteUrl = (value: string): boolean => {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
};

const pushError = (
  errors: ValidationError[],
  file: string,
  pathKey: string,
  message: string,
  severity: ValidationSeverity = 'error',
  line?: number,
  column?: number
): void => {
  errors.push({ file, path: pathKey, message, severity, line, column });
};

const extractLineInfo = (error: YAML.YAMLError): { line?: number; column?: number } => {
  const start = error.linePos?.[0];
  if (!start) return {};
  return { line: start.line, column: start.col };
};

// HAR is JSON, and JSON is YAML: one strict parser covers .har and .yaml
// captures and reports positions for both.
const parseStrict = (filePath: string, content: string): { data?: unknown; errors: ValidationError[] } => {
  const doc = YAML.parseDocument(content, {
    prettyErrors: true,
    uniqueKeys: true,
  });

  const errors: ValidationError[] = [];

  for (const err of doc.errors) {
    const { line, column } = extractLineInfo(err);
    pushError(errors, filePath, '', err.message, 'error', line, column);
  }

  for (const warn of doc.warnings) {
    const { line, column } = extractLineInfo(warn);
    pushError(errors, filePath, '', warn.message, 'warning', line, column);
  }

  if (errors.some((entry) => entry.severity === 'error')) {
    return { errors };
  }

  const data: unknown = doc.toJS({ maxAliasCount: 0 });
  return { data, errors };
};

const validatePairs = (value: unknown, filePath: string, basePath: string, label: string): ValidationError[] => {
  const errors: ValidationError[] = [];

  if (!Array.isArray(value)) {
    pushError(errors, filePath, basePath, `${label} must be an array`);
    return errors;
  }

  value.forEach((pair: unknown, index) => {
    const pairPath = `${basePath}[${index}]`;
    if (!isPlainObject(pair)) {
      pushError(errors, filePath, pairPath, `${label} entries must be objects`);
      return;
    }
    if (typeof pair.name !== 'string' || pair.name.length === 0) {
      pushError(errors, filePath, `${pairPath}.name`, 'name must be a non-empty string');
    }
    if (typeof pair.value !== 'string') {
      pushError(errors, filePath, `${pairPath}.value`, 'value must be a string');
    }
  });

  return errors;
};

const validateRequest = (request: unknown, filePath: string, basePath: string): ValidationError[] => {
  const errors: ValidationError[] = [];

  if (!isPlainObject(request)) {
    pushError(errors, filePath, basePath, 'request must be an object');
    return errors;
  }

  if (typeof request.method !== 'string' || request.method.trim().length === 0) {
    pushError(errors, filePath, `${basePath}.method`, 'method must be a non-empty string');
  }

  if (typeof request.url !== 'string') {
    pushError(errors, filePath, `${basePath}.url`, 'url must be a string');
  } else if (!isAbsoluteUrl(request.url)) {
    pushError(errors, filePath, `${basePath}.url`, `"${request.url}" is not an absolute URL`);
  }

  errors.push(...validatePairs(request.headers, filePath, `${basePath}.headers`, 'headers'));

  if (request.cookies !== undefined) {
    errors.push(...validatePairs(request.cookies, filePath, `${basePath}.cookies`, 'cookies'));
  }

  if (request.postData !== undefined) {
    if (!isPlainObject(request.postData)) {
      pushError(errors, filePath, `${basePath}.postData`, 'postData must be an object');
    } else if (request.postData.text !== undefined && typeof request.postData.text !== 'string') {
      pushError(errors, filePath, `${basePath}.postData.text`, 'postData.text must be a string');
    }
  }

  return errors;
};

const validateResponse = (response: unknown, filePath: string, basePath: string): ValidationError[] => {
  const errors: ValidationError[] = [];

  if (!isPlainObject(response)) {
    pushError(errors, filePath, basePath, 'response must be an object');
    return errors;
  }

  const { status } = response;
  if (typeof status !== 'number' || !Number.isInteger(status)) {
    pushError(errors, filePath, `${basePath}.status`, 'status must be an integer');
  } else if (status < 100 || status > 599) {
    pushError(errors, filePath, `${basePath}.status`, 'status must be between 100 and 599');
  }

  errors.push(...validatePairs(response.headers, filePath, `${basePath}.headers`, 'headers'));

  if (response.content !== undefined) {
    if (!isPlainObject(response.content)) {
      pushError(errors, filePath, `${basePath}.content`, 'content must be an object');
    } else {
      if (response.content.text !== undefined && typeof response.content.text !== 'string') {
        pushError(errors, filePath, `${basePath}.content.text`, 'content.text must be a string');
      }
      if (response.content.encoding !== undefined && typeof response.content.encoding !== 'string') {
        pushError(errors, filePath, `${basePath}.content.encoding`, 'content.encoding must be a string');
      }
    }
  }

  if (response.redirectURL !== undefined) {
    if (typeof response.redirectURL !== 'string') {
      pushError(errors, filePath, `${basePath}.redirectURL`, 'redirectURL must be a string');
    } else if (
      response.redirectURL !== '' &&
      typeof status === 'number' &&
      (status < 300 || status > 399)
    ) {
      pushError(
        errors,
        filePath,
        `${basePath}.redirectURL`,
        `redirectURL is set on a non-redirect status ${status}`,
        'warning'
      );
    }
  }

  return errors;
};

const validateEntry = (entry: unknown, filePath: string, index: number): ValidationError[] => {
  const basePath = `log.entries[${index}]`;

  if (!isPlainObject(entry)) {
    const errors: ValidationError[] = [];
    pushError(errors, filePath, basePath, 'Entry must be an object');
    return errors;
  }

  return [
    ...validateRequest(entry.request, filePath, `${basePath}.request`),
    ...validateResponse(entry.response, filePath, `${basePath}.response`),
  ];
};

const validateRoot = (value: unknown, filePath: string): ValidationError[] => {
  const errors: ValidationError[] = [];

  if (!isPlainObject(value)) {
    pushError(errors, filePath, '', 'Root document must be an object');
    return errors;
  }

  if (!isPlainObject(value.log)) {
    pushError(errors, filePath, 'log', 'log must be an object');
    return errors;
  }

  const { creator } = value.log;
  if (creator !== undefined) {
    if (!isPlainObject(creator) || typeof creator.name !== 'string') {
      pushError(errors, filePath, 'log.creator', 'creator must be an object with a string name');
    } else if (creator.version !== undefined && typeof creator.version !== 'string') {
      pushError(errors, filePath, 'log.creator.version', 'creator.version must be a string');
    }
  }

  if (!Array.isArray(value.log.entries)) {
    pushError(errors, filePath, 'log.entries', 'entries must be an array');
    return errors;
  }

  value.log.entries.forEach((entry: unknown, index) => {
    errors.push(...validateEntry(entry, filePath, index));
  });

  return errors;
};

export const parseCapture = (content: string, filePath: string): ValidationResult => {
  const parseResult = parseStrict(filePath, content);

  if (parseResult.data === undefined) {
    return { errors: parseResult.errors };
  }

  const errors = [...parseResult.errors, ...validateRoot(parseResult.data, filePath)];

  if (errors.some((entry) => entry.severity === 'error')) {
    return { errors };
  }

  return { capture: parseResult.data as Capture, errors };
};

export const validateCaptureFile = async (filePath: string): Promise<ValidationResult> => {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseCapture(content, filePath);
};

export const formatValidationErrors = (errors: ValidationError[]): string => {
  return errors
    .map((error) => {
      const location = error.line !== undefined ? `:${error.line}:${error.column ?? 0}` : '';
      return `${error.severity.toUpperCase()} ${error.file}${location}\n ○ ${error.path}\n   → ${error.message}`;
    })
    .join('\n\n');
};
