// src/replies.ts
// Reply text composed from catalog messages and backend results. No I/O, no session writes.

import type { AdvisoryError, Scalar, SowingAdvice, TopCrops, WaterRequirement } from './advisory.js';
import { t, type Lang } from './i18n.js';

const NA = 'N/A';

const grouped0 = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const grouped2 = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

/** 12345.6 -> "12,346" */
export function litres(n: number | undefined): string {
  return n === undefined ? NA : grouped0.format(n);
}

/** 1234.5 -> "1,234.50" */
export function money(n: number | undefined): string {
  return n === undefined ? NA : grouped2.format(n);
}

export function fixed(n: number | undefined, digits: number): string {
  return n === undefined ? NA : n.toFixed(digits);
}

export function shown(v: Scalar | undefined): string {
  return v === undefined ? NA : String(v);
}

/** "black GRAM" -> "Black Gram" */
export function titleCase(s: string): string {
  return s.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_, pre: string, c: string) => pre + c.toUpperCase());
}

const lines = (...parts: string[]) => parts.join('\n');

/* -------------------------------------------------------------------------- */

export function errorReply(lang: Lang, error: AdvisoryError): string {
  if (error.kind === 'connectivity') return t(lang, 'connection_error');
  return t(lang, 'error_generic', { error: error.message });
}

export function languageConfirmed(lang: Lang): string {
  return `${t(lang, 'language_set')}\n\n${t(lang, 'ask_area_type')}`;
}

export function optionList(lang: Lang, headerKey: string, names: readonly string[], promptKey: string): string {
  return lines(t(lang, headerKey), ...names.map((name, i) => `${i + 1}. ${name}`), t(lang, promptKey));
}

export function plotsFound(lang: Lang, count: number): string {
  return lines(t(lang, 'plots_header'), t(lang, 'plots_found', { count }));
}

export interface PlotSummary {
  plotNo: string;
  latitude: number;
  longitude: number;
}

function plotDetails(lang: Lang, plot: PlotSummary): string {
  return lines(
    t(lang, 'plot_info_header'),
    t(lang, 'plot_no_label', { plot_no: plot.plotNo }),
    t(lang, 'coordinates_label', { lat: fixed(plot.latitude, 6), lon: fixed(plot.longitude, 6) })
  );
}

export function plotOwnersPrompt(
  lang: Lang,
  plot: PlotSummary,
  owners: ReadonlyArray<{ name: string; area: Scalar | undefined }>
): string {
  return lines(
    plotDetails(lang, plot),
    '',
    t(lang, 'plot_owners_header'),
    ...owners.map((o, i) => t(lang, 'owner_line', { index: i + 1, name: o.name, area: shown(o.area) })),
    t(lang, 'select_owner_prompt')
  );
}

/** Plot without owners on record: setup completes straight away. */
export function plotSaved(lang: Lang, plot: PlotSummary): string {
  return `${plotDetails(lang, plot)}\n\n${t(lang, 'location_saved')}\n\n${t(lang, 'main_menu')}`;
}

export function ownerConfirmed(lang: Lang, ownerName: string, areaAres: number): string {
  return lines(
    t(lang, 'owner_selected', { owner_name: ownerName, area: areaAres }),
    t(lang, 'location_saved'),
    '',
    t(lang, 'main_menu')
  );
}

/* -------------------------------------------------------------------------- */

export function waterRequirementReport(lang: Lang, crop: string, req: WaterRequirement): string {
  return lines(
    t(lang, 'water_req_header', { crop: titleCase(req.cropUsed ?? (crop || 'Unknown')) }),
    t(lang, 'station_label', { station: titleCase(req.station ?? NA) }),
    t(lang, 'season_label', { season: titleCase(req.season ?? NA) }),
    '',
    t(lang, 'crop_et_label', { value: shown(req.cropEtMm) }),
    t(lang, 'seasonal_rain_label', { value: shown(req.seasonalRainMm) }),
    t(lang, 'effective_rain_label', { value: shown(req.effectiveRainMm) }),
    t(lang, 'net_irrigation_label', { value: shown(req.netIrrigationMm) }),
    t(lang, 'total_water_label', { value: litres(req.waterRequiredLitres) }),
    t(lang, 'estimated_profit_label', { value: money(req.totalRevenue) })
  );
}

export function solvencyVerdict(
  lang: Lang,
  solvent: boolean,
  v: { crop: string; required: number; balance: number }
): string {
  return t(lang, solvent ? 'solvency_success' : 'solvency_fail', {
    balance: litres(v.balance),
    required: litres(v.required),
    crop: titleCase(v.crop),
  });
}

export function topCropsReport(lang: Lang, top: TopCrops): string {
  const picks = top.crops.map((c, i) => {
    const name = `${i + 1}. ${titleCase(c.crop ?? 'Unknown')}`;
    if (c.profitMetric === undefined) return name;
    return `${name}  ${t(lang, 'profit_score_label', { score: fixed(c.profitMetric, 4) })}`;
  });
  return lines(
    t(lang, 'recommendations_header'),
    t(lang, 'station_label', { station: titleCase(top.station ?? NA) }),
    t(lang, 'season_label', { season: titleCase(top.season ?? NA) }),
    '',
    ...(picks.length ? picks : [t(lang, 'no_recommendations')]),
    '',
    t(lang, 'recommendations_tip'),
    t(lang, 'menu_prompt')
  );
}

export function sowingReport(lang: Lang, crop: string, advice: SowingAdvice): string {
  const menu = t(lang, 'menu_prompt');
  switch (advice.kind) {
    case 'crop_not_found':
      return `${t(lang, 'crop_not_found', { crop })}\n\n${menu}`;
    case 'advice':
      return `${t(lang, 'sowing_advice_header')}\n\n${advice.advice}\n\n${menu}`;
    case 'forecast': {
      const day = advice.bestDay;
      const out = [
        t(lang, 'sowing_result_header', { crop: titleCase(advice.crop ?? (crop || 'Unknown')) }),
        t(lang, 'best_sowing_date', { date: shown(day.date) }),
        t(lang, 'score_label', { score: shown(day.score) }),
        '',
        t(lang, 'soil_temp_label', { temp: shown(day.soilTemp) }),
        t(lang, 'soil_moisture_label', { moisture: shown(day.soilMoisture) }),
        t(lang, 'rain_prob_label', { prob: shown(day.rainProb) }),
        t(lang, 'expected_rain_label', { rain: shown(day.rainMm) }),
        '',
      ];
      if (advice.topDays.length) {
        out.push(
          t(lang, 'top_3_options'),
          ...advice.topDays.map((d, i) =>
            t(lang, 'sowing_day_line', { index: i + 1, date: shown(d.date), score: shown(d.score) })
          ),
          t(lang, 'higher_score_tip'),
          ''
        );
      }
      out.push(menu);
      return lines(...out);
    }
  }
}
