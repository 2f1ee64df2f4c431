import type { AqueousStream, FeedSpecification, FeedWithoutExtractant, SearchBounds } from './sx-types';
import { InvalidInputError } from './sx-errors';

export type SxCircuitRequest =
  | { mode: 'plant'; scenario: string; feed: FeedSpecification }
  | {
      mode: 'optimize';
      scenario: string;
      feed: FeedWithoutExtractant;
      target: number;
      searchBounds?: SearchBounds;
      tolerance?: number;
    };

type JsonObject = Record<string, unknown>;

function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireRecord(field: string, value: unknown): JsonObject {
  if (!isRecord(value)) throw new InvalidInputError(field, 'expected an object.');
  return value;
}

function optionalNumber(field: string, value: unknown): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number') throw new InvalidInputError(field, `expected a number, got ${typeof value}.`);
  return value;
}

function requireNumber(field: string, value: unknown): number {
  const n = optionalNumber(field, value);
  if (n === undefined) throw new InvalidInputError(field, 'is required.');
  return n;
}

function optionalNumberArray(field: string, value: unknown): number[] | undefined {
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) throw new InvalidInputError(field, 'expected an array of numbers.');
  return value.map((item, i) => requireNumber(`${field}[${i}]`, item));
}

function parsePlsStreams(value: unknown): AqueousStream[] {
  if (!Array.isArray(value)) throw new InvalidInputError('feed.plsStreams', 'expected an array of streams.');
  return value.map((item, i) => {
    const stream = requireRecord(`feed.plsStreams[${i}]`, item);
    return {
      copper: requireNumber(`feed.plsStreams[${i}].copper`, stream.copper),
      flow: requireNumber(`feed.plsStreams[${i}].flow`, stream.flow),
    };
  });
}

function parseFeedWithoutExtractant(value: unknown): FeedWithoutExtractant {
  const feed = requireRecord('feed', value);
  const strip = requireRecord('feed.stripLiquor', feed.stripLiquor);
  const conditions = feed.conditions === undefined ? undefined : requireRecord('feed.conditions', feed.conditions);
  const efficiencies = feed.mixerEfficiencies === undefined
    ? undefined
    : requireRecord('feed.mixerEfficiencies', feed.mixerEfficiencies);

  return {
    plsStreams: parsePlsStreams(feed.plsStreams),
    stripLiquor: {
      copper: requireNumber('feed.stripLiquor.copper', strip.copper),
      flow: optionalNumber('feed.stripLiquor.flow', strip.flow),
      acid: optionalNumber('feed.stripLiquor.acid', strip.acid),
    },
    organicToAqueous: optionalNumber('feed.organicToAqueous', feed.organicToAqueous),
    conditions: conditions && {
      plsPh: optionalNumber('feed.conditions.plsPh', conditions.plsPh),
      temperature: optionalNumber('feed.conditions.temperature', conditions.temperature),
    },
    mixerEfficiencies: efficiencies && {
      extraction: optionalNumberArray('feed.mixerEfficiencies.extraction', efficiencies.extraction),
      stripping: optionalNumberArray('feed.mixerEfficiencies.stripping', efficiencies.stripping),
    },
  };
}

function parseSearchBounds(value: unknown): SearchBounds | undefined {
  if (value === undefined || value === null) return undefined;
  const bounds = requireRecord('searchBounds', value);
  return { min: requireNumber('searchBounds.min', bounds.min), max: requireNumber('searchBounds.max', bounds.max) };
}

/** Narrows a decoded JSON body to a typed request. Range checks happen in the core. */
export function parseSxCircuitRequest(body: unknown): SxCircuitRequest {
  const request = requireRecord('body', body);
  if (typeof request.scenario !== 'string' || request.scenario === '') {
    throw new InvalidInputError('scenario', 'a scenario id is required.');
  }
  const scenario = request.scenario.trim().toUpperCase();
  const mode = request.mode ?? 'plant';

  if (mode === 'plant') {
    const feed = parseFeedWithoutExtractant(request.feed);
    const extractantVv = requireNumber('feed.extractantVv', requireRecord('feed', request.feed).extractantVv);
    return { mode: 'plant', scenario, feed: { ...feed, extractantVv } };
  }
  if (mode === 'optimize') {
    return {
      mode: 'optimize',
      scenario,
      feed: parseFeedWithoutExtractant(request.feed),
      target: requireNumber('target', request.target),
      searchBounds: parseSearchBounds(request.searchBounds),
      tolerance: optionalNumber('tolerance', request.tolerance),
    };
  }
  throw new InvalidInputError('mode', `expected "plant" or "optimize", got ${JSON.stringify(mode)}.`);
}
