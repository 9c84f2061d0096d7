import type { EventLogger } from '../logging/event-logger';
import { MalformedCaptureError } from '../replay/errors';
import { describeCapture } from './convert';
import type { LoadedCapture } from './types';
import { formatValidationErrors, validateCaptureFile } from './validation';

export const loadCapture = async (
  filePath: string,
  eventLogger?: EventLogger
): Promise<LoadedCapture> => {
  const result = await validateCaptureFile(filePath);
  const sortedErrors = [...result.errors].sort((a, b) =>
    `${a.path}:${a.message}`.localeCompare(`${b.path}:${b.message}`)
  );
  const errorList = sortedErrors.filter((entry) => entry.severity === 'error');

  eventLogger?.emitEvent({
    event: 'capture-validated',
    file: filePath,
    result: result.capture ? 'ok' : 'failed',
    errors:
      sortedErrors.length > 0
        ? sortedErrors.map((error) => ({
            path: error.path,
            message: error.message,
            severity: error.severity,
            line: error.line,
            column: error.column,
          }))
        : undefined,
  });

  if (!result.capture) {
    throw new MalformedCaptureError(filePath, formatValidationErrors(errorList), errorList);
  }

  const capture: LoadedCapture = { ...result.capture, sourcePath: filePath };

  eventLogger?.emitEvent({
    event: 'capture-loaded',
    file: filePath,
    summary: describeCapture(capture),
    entries: capture.log.entries.length,
  });

  return capture;
};
