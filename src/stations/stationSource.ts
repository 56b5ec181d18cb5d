import { readFile } from 'fs/promises';
import path from 'path';

import { fetch, type Dispatcher } from 'undici';
import { z } from 'zod';

import type { Station, StationSource } from './types';

const nullableString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : null))
  .nullish()
  .transform((value) => value ?? null);

const stationRecordSchema = z.object({
  icao: z
    .string()
    .trim()
    .transform((value) => value.toUpperCase())
    .pipe(z.string().regex(/^[A-Z0-9]{4}$/, 'icao must be four alphanumeric characters')),
  iata: nullableString,
  name: nullableString,
  city: nullableString,
  country: nullableString,
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  elevationFt: z.number().nullish().transform((value) => value ?? null),
  type: nullableString,
  reporting: z.boolean().default(true),
});

const stationListSchema = z.array(stationRecordSchema).min(1, 'station list must not be empty');

export const parseStationList = (payload: unknown, origin: string): Station[] => {
  const result = stationListSchema.safeParse(payload);

  if (!result.success) {
    const issue = result.error.issues[0];
    const location = issue ? issue.path.join('.') : 'root';
    throw new Error(`Invalid station data from ${origin} at ${location}: ${issue?.message ?? 'unknown'}`);
  }

  return result.data;
};

export class FileStationSource implements StationSource {
  readonly description: string;
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(process.cwd(), filePath);
    this.description = `file:${filePath}`;
  }

  async listAllStations(): Promise<Station[]> {
    const contents = await readFile(this.filePath, 'utf8');

    let payload: unknown;
    try {
      payload = JSON.parse(contents);
    } catch (error) {
      throw new Error(`Station file ${this.filePath} is not valid JSON`, { cause: error });
    }

    return parseStationList(payload, this.description);
  }
}

type HttpStationSourceOptions = {
  url: string;
  timeoutMs?: number;
  dispatcher?: Dispatcher;
};

export class HttpStationSource implements StationSource {
  readonly description: string;
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;

  constructor(options: HttpStationSourceOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.dispatcher = options.dispatcher;
    this.description = options.url;
  }

  async listAllStations(): Promise<Station[]> {
    const response = await fetch(this.url, {
      headers: { accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
      dispatcher: this.dispatcher,
    });

    if (!response.ok) {
      throw new Error(`Failed to download station list from ${this.url}: ${response.status}`);
    }

    return parseStationList(await response.json(), this.description);
  }
}
