/**
 * STATUS CLASSIFIER - turns one dashboard fragment into a Verdict
 *
 * Precedence, highest first:
 *   1. any error indicator        -> error   (errorCount only)
 *   2. any warning indicator      -> warning (warningCount + okCount)
 *   3. otherwise                  -> normal  (okCount)
 *
 * Indicator counting: an element whose text is a positive integer badge
 * contributes that number; any other element, or a badge too large to be
 * an exact integer, contributes 1. Counts of the same class sum.
 *
 * Dashboards that expose raw color swatches instead of indicator classes are
 * classified by comparing each normalized swatch color against the
 * configured error, warning and normal colors, with the same precedence.
 * Swatches matching none of the three (transparent backgrounds, labels)
 * are not counted.
 */

import {
  CHECK_FAILED_SUMMARY,
  StatusFragmentSchema,
  ok,
  err,
  type Result,
  type Severity,
  type Verdict,
} from '../types/index.js';
import { ClassificationError } from './errors.js';

export interface ClassifierOptions {
  errorColor?: string;
  warningColor?: string;
  normalColor?: string;
  now?: () => Date;
}

export const DEFAULT_ERROR_COLOR = '#e30613';
export const DEFAULT_WARNING_COLOR = '#ffcb05';
export const DEFAULT_NORMAL_COLOR = '#b4cc38';

const RGB_PATTERN = /^rgba?\s*\(\s*(\d+)\s*,\s*(\d+)\s*,\s*(\d+)/;

/**
 * Normalize a CSS color to a lowercase `#rrggbb` string.
 * Hex input is lowercased; `rgb()`/`rgba()` input is re-encoded from its
 * first three channels (alpha dropped). Anything else comes back trimmed
 * and lowercased.
 */
export function normalizeColor(value: string): string {
  const color = value.trim().toLowerCase();

  if (color.startsWith('#')) {
    return color;
  }

  const match = RGB_PATTERN.exec(color);
  if (match) {
    const hex = match
      .slice(1, 4)
      .map((channel) => Math.min(Number(channel), 255).toString(16).padStart(2, '0'))
      .join('');
    return `#${hex}`;
  }

  return color;
}

/**
 * Count indicator elements, honoring numeric badges.
 */
export function countIndicators(labels: readonly string[]): number {
  let total = 0;
  for (const label of labels) {
    const text = label.trim();
    const value = /^\d+$/.test(text) ? Number.parseInt(text, 10) : 0;
    total += value > 0 && Number.isSafeInteger(value) ? value : 1;
  }
  return total;
}

export function checkFailedVerdict(observedAt: Date): Verdict {
  return {
    severity: 'unknown',
    errorCount: 0,
    warningCount: 0,
    okCount: 0,
    summary: CHECK_FAILED_SUMMARY,
    observedAt,
  };
}

export function summarize(severity: Severity, counts: { errors: number; warnings: number; ok: number }): string {
  switch (severity) {
    case 'error':
      return `Error (${counts.errors})`;
    case 'warning':
      return `Warning (${counts.ok} ok, ${counts.warnings} warnings)`;
    case 'normal':
      return `Normal (${counts.ok} ok)`;
    case 'unknown':
      return CHECK_FAILED_SUMMARY;
  }
}

export class StatusClassifier {
  private readonly errorColor: string;
  private readonly warningColor: string;
  private readonly normalColor: string;
  private readonly now: () => Date;

  constructor(options: ClassifierOptions = {}) {
    this.errorColor = normalizeColor(options.errorColor ?? DEFAULT_ERROR_COLOR);
    this.warningColor = normalizeColor(options.warningColor ?? DEFAULT_WARNING_COLOR);
    this.normalColor = normalizeColor(options.normalColor ?? DEFAULT_NORMAL_COLOR);
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Classify a fragment. A malformed fragment yields an unknown verdict,
   * never a normal one.
   */
  classify(fragment: unknown): Verdict {
    const result = this.tryClassify(fragment);
    return result.success ? result.data : checkFailedVerdict(this.now());
  }

  tryClassify(fragment: unknown): Result<Verdict, ClassificationError> {
    const parsed = StatusFragmentSchema.safeParse(fragment);
    if (!parsed.success) {
      return err(new ClassificationError(`Unexpected fragment shape: ${parsed.error.message}`, { cause: parsed.error }));
    }

    const { errorIndicators, warningIndicators, okIndicators, swatchColors } = parsed.data;
    const observedAt = this.now();

    const hasIndicators = errorIndicators.length + warningIndicators.length + okIndicators.length > 0;
    if (!hasIndicators && swatchColors.length > 0) {
      return ok(this.classifySwatches(swatchColors, observedAt));
    }

    if (errorIndicators.length > 0) {
      const errors = countIndicators(errorIndicators);
      return ok(this.verdict('error', { errors, warnings: 0, ok: 0 }, observedAt));
    }

    const warnings = countIndicators(warningIndicators);
    const okCount = countIndicators(okIndicators);
    const severity: Severity = warnings > 0 ? 'warning' : 'normal';
    return ok(this.verdict(severity, { errors: 0, warnings, ok: okCount }, observedAt));
  }

  private classifySwatches(colors: readonly string[], observedAt: Date): Verdict {
    const counts = { errors: 0, warnings: 0, ok: 0 };
    for (const raw of colors) {
      const color = normalizeColor(raw);
      if (color === this.errorColor) counts.errors++;
      else if (color === this.warningColor) counts.warnings++;
      else if (color === this.normalColor) counts.ok++;
    }

    if (counts.errors > 0) {
      return this.verdict('error', { errors: counts.errors, warnings: 0, ok: 0 }, observedAt);
    }
    return this.verdict(counts.warnings > 0 ? 'warning' : 'normal', counts, observedAt);
  }

  private verdict(
    severity: Severity,
    counts: { errors: number; warnings: number; ok: number },
    observedAt: Date,
  ): Verdict {
    return {
      severity,
      errorCount: counts.errors,
      warningCount: counts.warnings,
      okCount: counts.ok,
      summary: summarize(severity, counts),
      observedAt,
    };
  }
}
