// src/advisory.ts
// Typed client for the advisory backend (location hierarchy, groundwater, crops, sowing).

import { fetch, type Dispatcher } from 'undici';
import { z } from 'zod';
import { moduleLogger, type Logger } from './logger.js';
import { BALANCE_FIELD_CANDIDATES, extractNumeric, isRecord, toNumber } from './numeric.js';
import type { AreaType } from './session.js';

/* -------------------------------------------------------------------------- */
/*                                  Results                                   */
/* -------------------------------------------------------------------------- */

export type AdvisoryError =
  | { kind: 'connectivity'; message: string }
  | { kind: 'remote'; message: string; status?: number };

export type AdvisoryResult<T> = { ok: true; value: T } | { ok: false; error: AdvisoryError };

export function ok<T>(value: T): AdvisoryResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: AdvisoryError): AdvisoryResult<T> {
  return { ok: false, error };
}

/* -------------------------------------------------------------------------- */
/*                                   Models                                   */
/* -------------------------------------------------------------------------- */

export type Scalar = string | number;

export interface LocationOption {
  code: string;
  name: string;
}

export interface VillageOption {
  name: string;
  gisCode: string;
  code?: string;
}

export interface PlotOwner {
  ownerName?: string;
  totalArea?: Scalar;
}

export interface PlotInfo {
  latitude?: number;
  longitude?: number;
  owners: PlotOwner[];
}

export interface GroundwaterBalance {
  value?: number;
  data: Record<string, unknown>;
}

export interface WaterRequirement {
  cropUsed?: string;
  season?: string;
  station?: string;
  cropEtMm?: number;
  seasonalRainMm?: number;
  effectiveRainMm?: number;
  netIrrigationMm?: number;
  totalRevenue?: number;
  waterRequiredLitres?: number;
}

export interface CropPick {
  crop?: string;
  profitMetric?: number;
}

export interface TopCrops {
  season?: string;
  station?: string;
  crops: CropPick[];
}

export interface SowingDay {
  date?: Scalar;
  score?: Scalar;
  soilTemp?: Scalar;
  soilMoisture?: Scalar;
  rainProb?: Scalar;
  rainMm?: Scalar;
}

export type SowingAdvice =
  | { kind: 'advice'; advice: string }
  | { kind: 'forecast'; crop?: string; bestDay: SowingDay; topDays: SowingDay[] }
  | { kind: 'crop_not_found' };

/* -------------------------------------------------------------------------- */
/*                                  Queries                                   */
/* -------------------------------------------------------------------------- */

export interface DistrictQuery {
  area: AreaType;
}
export interface TalukaQuery extends DistrictQuery {
  districtCode: string;
}
export interface VillageQuery extends TalukaQuery {
  talukaCode: string;
}
export interface SurveyQuery extends VillageQuery {
  villageCode: string;
}
export interface PlotQuery extends VillageQuery {
  villageGisCode: string;
  plotNo: string;
}
export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface AdvisoryApi {
  districts(q: DistrictQuery): Promise<AdvisoryResult<LocationOption[]>>;
  talukas(q: TalukaQuery): Promise<AdvisoryResult<LocationOption[]>>;
  villages(q: VillageQuery): Promise<AdvisoryResult<VillageOption[]>>;
  surveys(q: SurveyQuery): Promise<AdvisoryResult<string[]>>;
  plotInfo(q: PlotQuery): Promise<AdvisoryResult<PlotInfo>>;
  groundwaterBalance(q: Coordinates & { farmAreaAres: number }): Promise<AdvisoryResult<GroundwaterBalance>>;
  waterRequirement(q: Coordinates & { crop: string; farmArea: number }): Promise<AdvisoryResult<WaterRequirement>>;
  topCrops(q: Coordinates): Promise<AdvisoryResult<TopCrops>>;
  bestSowingDay(q: Coordinates & { crop: string }): Promise<AdvisoryResult<SowingAdvice>>;
}

/* -------------------------------------------------------------------------- */
/*                              Payload schemas                               */
/* -------------------------------------------------------------------------- */

const code = z.union([z.string(), z.number()]).transform(String);
const numeric = z.unknown().transform(toNumber);
const text = z
  .string()
  .nullish()
  .transform((v) => v || undefined);
const scalar = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => v ?? undefined);

const LocationList = z.array(z.object({ code, name: z.string() }));

const VillageList = z.array(
  z
    .object({
      name: z.string(),
      code: code.nullish(),
      gisCode: code.nullish(),
      villageGisCode: code.nullish(),
    })
    .transform((v, ctx): VillageOption => {
      const gisCode = v.gisCode || v.villageGisCode || v.code;
      if (!gisCode) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `village "${v.name}" has no code` });
        return z.NEVER;
      }
      return { name: v.name, gisCode, code: v.code || undefined };
    })
);

function plotNumbersOf(item: unknown): string[] {
  if (isRecord(item)) {
    const p = item.plotNo;
    return typeof p === 'string' || typeof p === 'number' ? [String(p)] : [];
  }
  if (typeof item === 'string' || typeof item === 'number') return [String(item)];
  return [];
}

const SurveyList = z.array(z.unknown()).transform((items) => items.flatMap(plotNumbersOf));

const PlotInfoPayload = z.object({
  latitude: numeric,
  longitude: numeric,
  owners: z
    .array(z.object({ ownerName: text, totalArea: scalar }))
    .nullish()
    .transform((v) => v ?? []),
});

const WaterRequirementPayload = z
  .object({
    crop_used: text,
    season: text,
    station: text,
    crop_et_mm: numeric,
    seasonal_rain_mm: numeric,
    effective_rain_mm: numeric,
    net_irrigation_mm: numeric,
    total_revenue: numeric,
    total_profit: numeric,
    water_required_litres: numeric,
  })
  .transform(
    (d): WaterRequirement => ({
      cropUsed: d.crop_used,
      season: d.season,
      station: d.station,
      cropEtMm: d.crop_et_mm,
      seasonalRainMm: d.seasonal_rain_mm,
      effectiveRainMm: d.effective_rain_mm,
      netIrrigationMm: d.net_irrigation_mm,
      totalRevenue: d.total_revenue ?? d.total_profit,
      waterRequiredLitres: d.water_required_litres,
    })
  );

const TopCropsPayload = z
  .object({
    season: text,
    station: text,
    top_3_crops: z
      .array(z.object({ crop: text, profit_metric: numeric }))
      .nullish(),
  })
  .transform(
    (d): TopCrops => ({
      season: d.season,
      station: d.station,
      crops: (d.top_3_crops ?? []).map((c) => ({ crop: c.crop, profitMetric: c.profit_metric })),
    })
  );

const SowingDayPayload = z
  .object({
    date: scalar,
    score: scalar,
    soil_temp: scalar,
    soil_moisture: scalar,
    rain_prob: scalar,
    rain_mm: scalar,
  })
  .transform(
    (d): SowingDay => ({
      date: d.date,
      score: d.score,
      soilTemp: d.soil_temp,
      soilMoisture: d.soil_moisture,
      rainProb: d.rain_prob,
      rainMm: d.rain_mm,
    })
  );

const SowingAdvicePayload = z.object({ advice: z.unknown() }).transform(
  (d): SowingAdvice => ({
    kind: 'advice',
    advice: typeof d.advice === 'string' && d.advice ? d.advice : 'No advice available',
  })
);

const SowingForecastPayload = z
  .object({
    crop: text,
    best_day: SowingDayPayload.nullish(),
    top_3_days: z.array(SowingDayPayload).nullish(),
  })
  .transform(
    (d): SowingAdvice => ({
      kind: 'forecast',
      crop: d.crop,
      bestDay: d.best_day ?? {},
      topDays: d.top_3_days ?? [],
    })
  );

const ErrorPayload = z.object({ error: z.string().nullish() }).passthrough();

/* -------------------------------------------------------------------------- */
/*                                HTTP client                                 */
/* -------------------------------------------------------------------------- */

type Query = Record<string, string | number | undefined>;

type Reply = { status: number; ok: boolean; json: boolean; body: unknown };

export interface HttpAdvisoryClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  /** undici dispatcher, e.g. a MockAgent in tests. */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

function describe(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === 'TimeoutError' || err.name === 'AbortError') return 'request timed out';
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}

export class HttpAdvisoryClient implements AdvisoryApi {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Dispatcher;
  private readonly log: Logger;

  constructor(opts: HttpAdvisoryClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.dispatcher = opts.dispatcher;
    this.log = opts.logger ?? moduleLogger('advisory');
  }

  districts(q: DistrictQuery) {
    return this.getJson('/levels/districts', { area: q.area }, LocationList);
  }

  talukas(q: TalukaQuery) {
    return this.getJson('/levels/talukas', { area: q.area, districtCode: q.districtCode }, LocationList);
  }

  villages(q: VillageQuery) {
    return this.getJson(
      '/levels/villages',
      { area: q.area, districtCode: q.districtCode, talukaCode: q.talukaCode },
      VillageList
    );
  }

  surveys(q: SurveyQuery) {
    return this.getJson(
      '/levels/surveys',
      { area: q.area, districtCode: q.districtCode, talukaCode: q.talukaCode, villageCode: q.villageCode },
      SurveyList
    );
  }

  plotInfo(q: PlotQuery) {
    return this.getJson(
      '/levels/plot-info',
      {
        area: q.area,
        districtCode: q.districtCode,
        talukaCode: q.talukaCode,
        villageGisCode: q.villageGisCode,
        plotNo: q.plotNo,
      },
      PlotInfoPayload
    );
  }

  async groundwaterBalance(q: Coordinates & { farmAreaAres: number }): Promise<AdvisoryResult<GroundwaterBalance>> {
    const path = '/balance/gw-balance';
    const res = await this.send('POST', path, {
      body: { latitude: q.latitude, longitude: q.longitude, farm_area_ares: q.farmAreaAres },
    });
    const checked = this.expectJson(path, res);
    if (!checked.ok) return checked;
    const payload = checked.value;
    return ok({
      value: extractNumeric(payload, BALANCE_FIELD_CANDIDATES),
      data: isRecord(payload) ? payload : { balance: payload },
    });
  }

  waterRequirement(q: Coordinates & { crop: string; farmArea: number }) {
    return this.postJson(
      '/crop/water-requirement',
      { latitude: q.latitude, longitude: q.longitude, crop: q.crop, farm_area: q.farmArea },
      WaterRequirementPayload
    );
  }

  topCrops(q: Coordinates) {
    return this.getJson('/crop/top-crops', { latitude: q.latitude, longitude: q.longitude }, TopCropsPayload);
  }

  async bestSowingDay(q: Coordinates & { crop: string }): Promise<AdvisoryResult<SowingAdvice>> {
    const path = '/sowing/best-sowing-day';
    const res = await this.send('GET', path, { query: { lat: q.latitude, lon: q.longitude, crop: q.crop } });
    if (!res.ok) return res;
    const reply = res.value;

    if (reply.status === 400) {
      const parsed = ErrorPayload.safeParse(reply.body);
      const message = (parsed.success && parsed.data.error) || 'Unknown error';
      if (message.includes('Crop not found')) return ok({ kind: 'crop_not_found' });
      return fail({ kind: 'remote', status: 400, message });
    }
    if (reply.status !== 200) {
      return fail({ kind: 'remote', status: reply.status, message: `API returned status code ${reply.status}` });
    }
    // a plain `advice` field replaces the forecast
    const schema = isRecord(reply.body) && 'advice' in reply.body ? SowingAdvicePayload : SowingForecastPayload;
    return this.parse(path, reply.body, schema);
  }

  /* ------------------------------ internals ------------------------------- */

  private url(path: string, query?: Query): string {
    const qs = new URLSearchParams();
    for (const [k, v] of Object.entries(query ?? {})) {
      if (v !== undefined) qs.append(k, String(v));
    }
    const s = qs.toString();
    return `${this.baseUrl}${path}${s ? `?${s}` : ''}`;
  }

  private async send(
    method: 'GET' | 'POST',
    path: string,
    opts: { query?: Query; body?: unknown }
  ): Promise<AdvisoryResult<Reply>> {
    const url = this.url(path, opts.query);
    try {
      const res = await fetch(url, {
        method,
        headers: opts.body === undefined ? undefined : { 'Content-Type': 'application/json' },
        body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.dispatcher,
      });
      const raw = await res.text();
      let body: unknown = undefined;
      let json = false;
      if (raw) {
        try {
          body = JSON.parse(raw);
          json = true;
        } catch {
          json = false;
        }
      }
      this.log.debug({ method, path, status: res.status }, 'backend reply');
      return ok({ status: res.status, ok: res.ok, json, body });
    } catch (err) {
      this.log.warn({ err, method, path }, 'backend unreachable');
      return fail({ kind: 'connectivity', message: describe(err) });
    }
  }

  private expectJson(path: string, res: AdvisoryResult<Reply>): AdvisoryResult<unknown> {
    if (!res.ok) return res;
    const reply = res.value;
    if (!reply.ok) {
      this.log.warn({ path, status: reply.status }, 'backend error status');
      return fail({ kind: 'remote', status: reply.status, message: `Backend returned HTTP ${reply.status} for ${path}` });
    }
    if (!reply.json) {
      return fail({ kind: 'remote', status: reply.status, message: `Backend returned invalid JSON for ${path}` });
    }
    return ok(reply.body);
  }

  private parse<S extends z.ZodTypeAny>(path: string, body: unknown, schema: S): AdvisoryResult<z.output<S>> {
    const parsed = schema.safeParse(body);
    if (parsed.success) return ok(parsed.data);
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? ` at ${issue.path.join('.')}` : '';
    this.log.warn({ path, issues: parsed.error.issues }, 'unexpected backend payload');
    return fail({
      kind: 'remote',
      message: `Unexpected response from ${path}${where}: ${issue?.message ?? 'invalid payload'}`,
    });
  }

  private async getJson<S extends z.ZodTypeAny>(
    path: string,
    query: Query,
    schema: S
  ): Promise<AdvisoryResult<z.output<S>>> {
    const checked = this.expectJson(path, await this.send('GET', path, { query }));
    if (!checked.ok) return checked;
    return this.parse(path, checked.value, schema);
  }

  private async postJson<S extends z.ZodTypeAny>(
    path: string,
    body: unknown,
    schema: S
  ): Promise<AdvisoryResult<z.output<S>>> {
    const checked = this.expectJson(path, await this.send('POST', path, { body }));
    if (!checked.ok) return checked;
    return this.parse(path, checked.value, schema);
  }
}
