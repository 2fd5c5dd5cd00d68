/**
 * ErrorPresenter - pure presentation layer for AbiSeedError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import { hintFor } from './suggestions.js';
import {
  DescriptorError,
  type AbiSeedError,
  type SerializedError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  details: string[];
  hint?: string;
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: AbiSeedError): CLIErrorView {
    const ctx = error.context;
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      location: this.#formatLocation(error),
      excerpt: this.env === 'dev' ? ctx?.valueExcerpt : undefined,
      details: error instanceof DescriptorError ? error.issues.slice(1) : [],
      hint: hintFor(error.errorCode, ctx?.actual),
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout.columns || 80,
    };
  }

  /** Structured form for log sinks; never carries value excerpts. */
  formatForProduction(error: AbiSeedError): SerializedError {
    return error.toJSON('prod');
  }

  #formatLocation(error: AbiSeedError): string | undefined {
    const ctx = error.context;
    if (!ctx) return undefined;
    const parts: string[] = [];
    if (ctx.path) parts.push(ctx.path);
    if (ctx.typeKey) parts.push(`(${ctx.typeKey})`);
    if (ctx.setting) parts.push(`setting ${ctx.setting}`);
    return parts.length > 0 ? `Location: ${parts.join(' ')}` : undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }
}
