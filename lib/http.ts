import { NextResponse } from 'next/server';
import { parseConfigJson, type ConfigLayer } from './config';
import { formatErrorMessage, httpStatusFor, ProcessingError, ProcessingErrorCode } from './errors';
import { logger } from './logger';

export const ACCEPTED_EXTENSIONS = ['png', 'jpg', 'jpeg', 'bmp', 'tiff', 'webp'] as const;

export function fileExtension(name: string) {
  const dot = name.lastIndexOf('.');
  return dot >= 0 ? name.slice(dot + 1).toLowerCase() : '';
}

export function fileStem(name: string) {
  const base = name.slice(name.lastIndexOf('/') + 1);
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(0, dot) : base;
}

export function isAcceptedUpload(name: string) {
  const ext = fileExtension(name);
  return ACCEPTED_EXTENSIONS.some((accepted) => accepted === ext);
}

export function missingInput(message: string) {
  return new ProcessingError(message, ProcessingErrorCode.UNREADABLE_INPUT);
}

/** Reads the optional `config` form field as a JSON override layer. */
export function configFromForm(form: FormData): ConfigLayer {
  const raw = form.get('config');
  return parseConfigJson(typeof raw === 'string' ? raw : null);
}

/** JSON with non-ASCII escaped, so it is a valid header value. */
export function toHeaderJson(value: unknown) {
  return JSON.stringify(value).replace(/[\u007f-\uffff]/g, (ch) => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

export function errorResponse(error: unknown, context: Record<string, unknown> = {}) {
  const body = formatErrorMessage(error);
  const status = httpStatusFor(error);
  if (status >= 500) {
    logger.error('Processing request failed', { ...context, ...body, error: error instanceof Error ? error : String(error) });
  } else {
    logger.info('Rejected processing request', { ...context, ...body });
  }
  return NextResponse.json(body, { status });
}
