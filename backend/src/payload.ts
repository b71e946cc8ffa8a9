/**
 * Readers for untrusted JSON bodies (REST requests and bridge frames)
 */

import { BadRequest } from './errors';
import { GameSymbol } from './types';
import { isGameSymbol } from './ticTacToe';

export type Payload = Record<string, unknown>;

export function isPayload(value: unknown): value is Payload {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asPayload(value: unknown): Payload {
  if (value === undefined || value === null) return {};
  if (!isPayload(value)) throw new BadRequest('Expected a JSON object');
  return value;
}

export function readString(payload: Payload, key: string): string {
  const value = payload[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new BadRequest(`${key} required`);
  }
  return value;
}

export function readOptionalString(payload: Payload, key: string): string | undefined {
  const value = payload[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new BadRequest(`${key} must be a string`);
  return value;
}

export function readStringList(payload: Payload, key: string): string[] {
  const value = payload[key];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new BadRequest(`${key} must be an array of strings`);
  }
  return value;
}

export function readOptionalInt(payload: Payload, key: string): number | undefined {
  const value = payload[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new BadRequest(`${key} must be an integer`);
  }
  return value;
}

export function readInt(payload: Payload, key: string): number {
  const value = readOptionalInt(payload, key);
  if (value === undefined) throw new BadRequest(`${key} required`);
  return value;
}

export function readSymbol(payload: Payload, key: string): GameSymbol | undefined {
  const value = readOptionalString(payload, key);
  if (value === undefined) return undefined;
  if (!isGameSymbol(value)) throw new BadRequest(`${key} must be X or O`);
  return value;
}
