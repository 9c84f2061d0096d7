import type { ValidationError } from '../capture/validation';

export class NoMatchFoundError extends Error {
  readonly method: string;
  readonly url: string;
  readonly remaining: number;

  constructor(method: string, url: string, remaining: number) {
    super(`No matching entry in capture found for ${method} ${url}`);
    this.name = 'NoMatchFoundError';
    this.method = method;
    this.url = url;
    this.remaining = remaining;
  }
}

export class IndexOutOfRangeError extends Error {
  readonly index: number;
  readonly count: number;

  constructor(index: number, count: number) {
    super(`Entry index ${index} is out of range (store holds ${count} entries)`);
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.count = count;
  }
}

export class MalformedCaptureError extends Error {
  readonly file: string;
  readonly errors: ValidationError[];

  constructor(file: string, message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'MalformedCaptureError';
    this.file = file;
    this.errors = errors;
  }
}
