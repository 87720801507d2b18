/**
 * ErrorPresenter - pure presentation layer for FormCodecError instances
 * - No business logic; formats into environment-specific view objects
 */

import { getHttpStatus, type ErrorCode } from './codes.js';
import type {
  ErrorContext,
  FormCodecError,
  SerializedError,
} from '../types/errors.js';
import { ConfigError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
  redactKeys?: string[];
  requestId?: string;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  key?: string;
  path?: string;
  details: string[];
  suggestion?: string;
  colors: boolean;
  terminalWidth: number;
}

export interface APIErrorView {
  status: number;
  type: string;
  title: string;
  detail: string;
  instance?: string;
  code: ErrorCode;
  key?: string;
  path?: string;
  suggestions: string[];
}

export type ProductionView = SerializedError & { requestId?: string };

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: FormCodecError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      key: error.context.key,
      path: error.context.path,
      details: error instanceof ConfigError ? [...error.details] : [],
      suggestion: this.#formatSuggestion(error),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  /** RFC 7807-style problem view */
  formatForAPI(error: FormCodecError): APIErrorView {
    return {
      status: getHttpStatus(error.errorCode),
      type: `urn:formcodec:error:${error.errorCode}`,
      title: error.message,
      detail: this.#getDetail(error),
      instance: this.#getRequestId(),
      code: error.errorCode,
      key: error.context.key,
      path: error.context.path,
      suggestions: error.suggestions ?? [],
    };
  }

  formatForProduction(error: FormCodecError): ProductionView {
    // The error redacts its own sensitive fields; presenter keys come on top.
    const base = error.toJSON('prod');
    const redacted = this.#applyAdditionalRedaction(base);
    return { ...redacted, requestId: this.#getRequestId() };
  }

  #formatTitle(error: FormCodecError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx: ErrorContext): string | undefined {
    if (ctx.key !== undefined) return `Key: ${ctx.key}`;
    if (ctx.path !== undefined) return `Path: ${ctx.path}`;
    return undefined;
  }

  #formatSuggestion(error: FormCodecError): string | undefined {
    if (error.context.suggestion !== undefined) return error.context.suggestion;
    const first = error.suggestions?.[0];
    return first === undefined ? undefined : `Did you mean "${first}"?`;
  }

  #getDetail(error: FormCodecError): string {
    const parts: string[] = [error.message];
    const loc = error.context.key ?? error.context.path;
    if (loc !== undefined) parts.push(`at ${loc}`);
    return parts.join(' ');
  }

  #getRequestId(): string | undefined {
    return this.options.requestId || process.env.REQUEST_ID || undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }

  #applyAdditionalRedaction(view: SerializedError): SerializedError {
    const keys = this.options.redactKeys;
    if (!keys || keys.length === 0 || !view.context) return view;

    const context = view.context;
    const names = [context.field, ...(context.key ?? '').split(/[[\]]/)];
    const hit = names.some(
      (name) => name !== undefined && name !== '' && keys.includes(name)
    );
    if (!hit || !('value' in context)) return view;
    return { ...view, context: { ...context, value: '[REDACTED]' } };
  }
}

export default ErrorPresenter;
