import type { SearchRequest, SearchScope } from './types';
import { hoursToMilliseconds } from '../utils/dateUtils';

export type InputError = 'emptyField' | 'wrongInput';

export type InputField = 'duration' | 'energyAmount' | 'power';

export interface SearchFormInput {
  mode: SearchRequest['mode'];
  /** Duration in hours, only for `byDuration` */
  durationText?: string;
  /** kWh, only for `byEnergyAndPower` */
  energyText?: string;
  /** kW, required for `byEnergyAndPower`, optional otherwise */
  powerText?: string;
  scope: SearchScope;
  vatEnabled: boolean;
}

export type BuildRequestResult =
  | { ok: true; request: SearchRequest }
  | { ok: false; errors: Array<{ field: InputField; error: InputError }> };

const DECIMAL_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse a decimal number typed by a user.
 * Accepts either "," or "." as the decimal separator.
 * @param text - Raw input
 * @returns Parsed value, or the input error
 */
export function parseDecimalInput(text: string | undefined): { ok: true; value: number } | { ok: false; error: InputError } {
  const trimmed = (text ?? '').trim();
  if (trimmed === '') {
    return { ok: false, error: 'emptyField' };
  }
  const normalized = trimmed.replace(',', '.');
  if (!DECIMAL_PATTERN.test(normalized)) {
    return { ok: false, error: 'wrongInput' };
  }
  return { ok: true, value: Number(normalized) };
}

/**
 * Length of the window a request asks for.
 * Energy requests run for energy ÷ power hours.
 * @param request - Search request
 * @returns Duration in whole milliseconds
 */
export function resolveDurationMs(request: SearchRequest): number {
  if (request.mode === 'byEnergyAndPower') {
    return hoursToMilliseconds(request.energyAmount / request.power);
  }
  return request.durationMs;
}

/**
 * Parse a positive quantity, recording an error for the field when invalid
 */
function parsePositive(
  text: string | undefined,
  field: InputField,
  errors: Array<{ field: InputField; error: InputError }>,
): number | undefined {
  const parsed = parseDecimalInput(text);
  if (!parsed.ok) {
    errors.push({ field, error: parsed.error });
    return undefined;
  }
  if (parsed.value <= 0) {
    errors.push({ field, error: 'wrongInput' });
    return undefined;
  }
  return parsed.value;
}

/**
 * Validate form input and build a search request.
 * All invalid fields are reported together.
 * @param input - Values as typed by the user
 * @returns The request, or every field error found
 */
export function buildSearchRequest(input: SearchFormInput): BuildRequestResult {
  const errors: Array<{ field: InputField; error: InputError }> = [];
  const { scope, vatEnabled } = input;

  if (input.mode === 'byEnergyAndPower') {
    const energyAmount = parsePositive(input.energyText, 'energyAmount', errors);
    const power = parsePositive(input.powerText, 'power', errors);
    if (energyAmount === undefined || power === undefined) {
      return { ok: false, errors };
    }
    return { ok: true, request: { mode: 'byEnergyAndPower', energyAmount, power, scope, vatEnabled } };
  }

  const durationHours = parsePositive(input.durationText, 'duration', errors);
  // Power is optional here and only reported when given
  const hasPower = (input.powerText ?? '').trim() !== '';
  const power = hasPower ? parsePositive(input.powerText, 'power', errors) : undefined;
  if (durationHours === undefined || errors.length > 0) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    request: {
      mode: 'byDuration',
      durationMs: hoursToMilliseconds(durationHours),
      scope,
      vatEnabled,
      ...(power !== undefined ? { power } : {}),
    },
  };
}
