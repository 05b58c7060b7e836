// src/engine.ts
// Conversation engine: one inbound text in, one reply out, per-user state in the SessionStore.

import type { AdvisoryApi, AdvisoryError, Coordinates } from './advisory.js';
import { DEFAULT_LANG, parseLanguageChoice, t, type Lang } from './i18n.js';
import { moduleLogger, type Logger } from './logger.js';
import { toNumber } from './numeric.js';
import {
  errorReply,
  languageConfirmed,
  optionList,
  ownerConfirmed,
  plotOwnersPrompt,
  plotSaved,
  plotsFound,
  solvencyVerdict,
  sowingReport,
  topCropsReport,
  waterRequirementReport,
} from './replies.js';
import {
  completeLocationSetup,
  fullReset,
  issueSelection,
  numbered,
  resolveSelection,
  resumeState,
  softReset,
  type AreaType,
  type OwnerChoice,
  type Session,
  type State,
} from './session.js';
import type { SessionStore } from './store.js';

const GREETINGS = new Set(['hi', 'hello', 'hey', 'start', 'menu']);

interface Turn {
  userId: string;
  session: Session;
  lang: Lang;
  /** trimmed, case preserved */
  text: string;
  /** trimmed, lower-cased */
  normalized: string;
}

type Handler = (turn: Turn) => Promise<string>;

export interface ConversationEngineOptions {
  store: SessionStore;
  advisory: AdvisoryApi;
  logger?: Logger;
}

export class ConversationEngine {
  private readonly store: SessionStore;
  private readonly advisory: AdvisoryApi;
  private readonly log: Logger;
  private readonly handlers: Record<State, Handler>;

  constructor(opts: ConversationEngineOptions) {
    this.store = opts.store;
    this.advisory = opts.advisory;
    this.log = opts.logger ?? moduleLogger('engine');
    this.handlers = {
      START: async ({ session }) => this.resume(session),
      SELECT_LANGUAGE: async (turn) => this.onLanguage(turn),
      SETUP_AREA_TYPE: (turn) => this.onAreaType(turn),
      SETUP_SELECT_DISTRICT: (turn) => this.onDistrict(turn),
      SETUP_SELECT_TALUKA: (turn) => this.onTaluka(turn),
      SETUP_SELECT_VILLAGE: (turn) => this.onVillage(turn),
      SETUP_SELECT_PLOT: (turn) => this.onPlot(turn),
      SETUP_SELECT_OWNER: (turn) => this.onOwner(turn),
      MAIN_MENU: (turn) => this.onMenu(turn),
      SOWING_COLLECT_CROP: (turn) => this.onSowingCrop(turn),
      SOLVENCY_COLLECT_CROP: (turn) => this.onSolvencyCrop(turn),
    };
  }

  /** Never rejects: anything unexpected is logged and answered with the fallback message. */
  async handleIncoming(userId: string, rawText: string): Promise<string> {
    try {
      return await this.store.withSession(userId, (session) => this.step(userId, session, rawText));
    } catch (err) {
      this.log.error({ err, userId }, 'failed to handle message');
      return t(this.store.peek(userId)?.language ?? DEFAULT_LANG, 'fallback');
    }
  }

  private async step(userId: string, session: Session, rawText: string): Promise<string> {
    const text = rawText.trim();
    const normalized = text.toLowerCase();
    const from = session.state;

    let reply: string;
    if (normalized === 'reset') {
      fullReset(session);
      session.state = 'SELECT_LANGUAGE';
      reply = t(DEFAULT_LANG, 'welcome_language');
    } else if (GREETINGS.has(normalized)) {
      softReset(session);
      reply = this.resume(session);
    } else {
      reply = await this.handlers[from]({ userId, session, lang: session.language, text, normalized });
    }

    if (session.state !== from) this.log.debug({ userId, from, to: session.state }, 'state transition');
    return reply;
  }

  /** Re-derive the state from the session flags and prompt for it. */
  private resume(s: Session): string {
    const next = resumeState(s);
    s.state = next;
    switch (next) {
      case 'MAIN_MENU':
        return t(s.language, 'main_menu');
      case 'SETUP_AREA_TYPE':
        return t(s.language, 'ask_area_type');
      case 'SELECT_LANGUAGE':
        return t(DEFAULT_LANG, 'welcome_language');
    }
  }

  /** A session missing fields its state depends on; start that part over. */
  private lost(turn: Turn, missing: string): string {
    this.log.warn({ userId: turn.userId, state: turn.session.state, missing }, 'session inconsistent, resuming');
    softReset(turn.session);
    return this.resume(turn.session);
  }

  private failed(turn: Turn, op: string, error: AdvisoryError): string {
    this.log.warn({ userId: turn.userId, op, error }, 'advisory call failed');
    return errorReply(turn.lang, error);
  }

  /* ------------------------------- language ------------------------------- */

  private onLanguage({ session, normalized }: Turn): string {
    const lang = parseLanguageChoice(normalized);
    if (!lang) return t(DEFAULT_LANG, 'invalid_language');
    session.language = lang;
    session.languageSet = true;
    session.state = 'SETUP_AREA_TYPE';
    return languageConfirmed(lang);
  }

  /* ---------------------------- location setup ---------------------------- */

  private async onAreaType(turn: Turn): Promise<string> {
    const area = parseArea(turn.normalized);
    if (!area) return t(turn.lang, 'invalid_area_type');
    turn.session.area = area;

    const res = await this.advisory.districts({ area });
    if (!res.ok) return this.failed(turn, 'districts', res.error);
    if (!res.value.length) return t(turn.lang, 'no_districts');

    issueSelection(turn.session, { kind: 'district', entries: numbered(res.value.map((d) => d.code)) });
    turn.session.state = 'SETUP_SELECT_DISTRICT';
    return optionList(
      turn.lang,
      area === 'U' ? 'districts_header_urban' : 'districts_header_rural',
      res.value.map((d) => d.name),
      'select_district'
    );
  }

  private async onDistrict(turn: Turn): Promise<string> {
    const { session: s } = turn;
    const districtCode = resolveSelection(s, 'district', turn.text);
    if (districtCode === undefined) return t(turn.lang, 'invalid_selection');
    if (!s.area) return this.lost(turn, 'area');
    s.districtCode = districtCode;

    const res = await this.advisory.talukas({ area: s.area, districtCode });
    if (!res.ok) return this.failed(turn, 'talukas', res.error);
    if (!res.value.length) return t(turn.lang, 'no_talukas');

    issueSelection(s, { kind: 'taluka', entries: numbered(res.value.map((v) => v.code)) });
    s.state = 'SETUP_SELECT_TALUKA';
    return optionList(turn.lang, 'talukas_header', res.value.map((v) => v.name), 'select_taluka');
  }

  private async onTaluka(turn: Turn): Promise<string> {
    const { session: s } = turn;
    const talukaCode = resolveSelection(s, 'taluka', turn.text);
    if (talukaCode === undefined) return t(turn.lang, 'invalid_selection');
    if (!s.area || !s.districtCode) return this.lost(turn, 'area/district');
    s.talukaCode = talukaCode;

    const res = await this.advisory.villages({ area: s.area, districtCode: s.districtCode, talukaCode });
    if (!res.ok) return this.failed(turn, 'villages', res.error);
    if (!res.value.length) return t(turn.lang, 'no_villages');

    issueSelection(s, {
      kind: 'village',
      entries: numbered(res.value.map((v) => ({ gisCode: v.gisCode, code: v.code }))),
    });
    s.state = 'SETUP_SELECT_VILLAGE';
    return optionList(turn.lang, 'villages_header', res.value.map((v) => v.name), 'select_village');
  }

  private async onVillage(turn: Turn): Promise<string> {
    const { session: s } = turn;
    const village = resolveSelection(s, 'village', turn.text);
    if (!village) return t(turn.lang, 'invalid_selection');
    if (!s.area || !s.districtCode || !s.talukaCode) return this.lost(turn, 'area/district/taluka');
    s.villageGisCode = village.gisCode;
    s.villageCode = village.code;

    const res = await this.advisory.surveys({
      area: s.area,
      districtCode: s.districtCode,
      talukaCode: s.talukaCode,
      villageCode: village.gisCode,
    });
    if (!res.ok) return this.failed(turn, 'surveys', res.error);
    if (!res.value.length) return t(turn.lang, 'no_plots');

    s.availablePlots = res.value;
    s.selection = undefined;
    s.state = 'SETUP_SELECT_PLOT';
    return plotsFound(turn.lang, res.value.length);
  }

  private async onPlot(turn: Turn): Promise<string> {
    const { session: s, lang } = turn;
    const plotNo = turn.text;
    if (s.availablePlots && !s.availablePlots.includes(plotNo)) {
      return t(lang, 'plot_not_found', { plot_no: plotNo });
    }
    if (!s.area || !s.districtCode || !s.talukaCode || !s.villageGisCode) {
      return this.lost(turn, 'area/district/taluka/village');
    }
    s.plotNo = plotNo;

    const res = await this.advisory.plotInfo({
      area: s.area,
      districtCode: s.districtCode,
      talukaCode: s.talukaCode,
      villageGisCode: s.villageGisCode,
      plotNo,
    });
    if (!res.ok) return this.failed(turn, 'plotInfo', res.error);

    const { latitude, longitude, owners } = res.value;
    if (latitude === undefined || longitude === undefined) {
      return t(lang, 'plot_no_coordinates', { plot_no: plotNo });
    }
    s.latitude = latitude;
    s.longitude = longitude;
    const plot = { plotNo, latitude, longitude };

    if (!owners.length) {
      s.plotOwners = [];
      completeLocationSetup(s, { latitude, longitude, farmAreaAres: 0, ownerName: 'Unknown' });
      return plotSaved(lang, plot);
    }

    const choices: OwnerChoice[] = owners.map((o) => ({
      name: o.ownerName ?? 'N/A',
      areaAres: toNumber(o.totalArea) ?? 0,
    }));
    s.plotOwners = choices;
    issueSelection(s, { kind: 'owner', entries: numbered(choices) });
    s.state = 'SETUP_SELECT_OWNER';
    return plotOwnersPrompt(
      lang,
      plot,
      owners.map((o, i) => ({ name: choices[i]?.name ?? 'N/A', area: o.totalArea }))
    );
  }

  private async onOwner(turn: Turn): Promise<string> {
    const { session: s, lang } = turn;
    const owner = resolveSelection(s, 'owner', turn.text);
    if (!owner) return t(lang, 'invalid_owner_selection');
    if (s.latitude === undefined || s.longitude === undefined) return this.lost(turn, 'coordinates');
    const { latitude, longitude } = s;

    const res = await this.advisory.groundwaterBalance({ latitude, longitude, farmAreaAres: owner.areaAres });
    if (!res.ok) return this.failed(turn, 'groundwaterBalance', res.error);

    completeLocationSetup(s, {
      latitude,
      longitude,
      farmAreaAres: owner.areaAres,
      ownerName: owner.name,
      balance: res.value,
    });
    this.log.info(
      { userId: turn.userId, owner: owner.name, areaAres: owner.areaAres, balance: res.value.value },
      'location setup complete'
    );
    return ownerConfirmed(lang, owner.name, owner.areaAres);
  }

  /* ------------------------------- main menu ------------------------------ */

  private async onMenu(turn: Turn): Promise<string> {
    const { session: s, lang } = turn;
    switch (turn.normalized) {
      case '1':
        s.state = 'SOWING_COLLECT_CROP';
        return t(lang, 'sowing_ask_crop');
      case '2':
        s.state = 'SOLVENCY_COLLECT_CROP';
        return t(lang, 'solvency_ask_crop');
      case '3': {
        const at = farmCoordinates(s);
        if (!at) return this.lost(turn, 'coordinates');
        return this.recommendations(turn, at);
      }
      default:
        return t(lang, 'invalid_menu_choice');
    }
  }

  private async recommendations(turn: Turn, at: Coordinates): Promise<string> {
    const res = await this.advisory.topCrops(at);
    if (!res.ok) return this.failed(turn, 'topCrops', res.error);
    return topCropsReport(turn.lang, res.value);
  }

  /* ------------------------------ sub-flows ------------------------------- */

  private async onSowingCrop(turn: Turn): Promise<string> {
    const { session: s, lang } = turn;
    const crop = turn.text;
    s.crop = crop;
    s.state = 'MAIN_MENU';
    const at = farmCoordinates(s);
    if (!at) return this.lost(turn, 'coordinates');

    const res = await this.advisory.bestSowingDay({ ...at, crop });
    if (!res.ok) return this.failed(turn, 'bestSowingDay', res.error);
    return sowingReport(lang, crop, res.value);
  }

  private async onSolvencyCrop(turn: Turn): Promise<string> {
    const { session: s, lang } = turn;
    const crop = turn.text;
    s.crop = crop;
    s.state = 'MAIN_MENU';
    const at = farmCoordinates(s);
    if (!at || s.farmAreaAres === undefined) return this.lost(turn, 'coordinates/farm area');

    const res = await this.advisory.waterRequirement({ ...at, crop, farmArea: s.farmAreaAres });
    if (!res.ok) return this.failed(turn, 'waterRequirement', res.error);

    const req = res.value;
    const report = waterRequirementReport(lang, crop, req);
    const required = req.waterRequiredLitres;
    const balance = s.waterBalanceValue;
    if (required === undefined || balance === undefined) {
      return `${report}\n\n${t(lang, 'menu_prompt')}`;
    }

    const verdict = { crop: req.cropUsed ?? (crop || 'Unknown'), required, balance };
    if (required <= balance) {
      return `${report}\n\n${solvencyVerdict(lang, true, verdict)}\n\n${t(lang, 'menu_prompt')}`;
    }
    this.log.info({ userId: turn.userId, crop, required, balance }, 'solvency check failed, recommending crops');
    const escalation = await this.recommendations(turn, at);
    return `${report}\n\n${solvencyVerdict(lang, false, verdict)}\n\n${escalation}`;
  }
}

function parseArea(input: string): AreaType | undefined {
  if (input === 'u' || input === 'urban') return 'U';
  if (input === 'r' || input === 'rural') return 'R';
  return undefined;
}

function farmCoordinates(s: Session): Coordinates | undefined {
  if (!s.locationSetupComplete || s.latitude === undefined || s.longitude === undefined) return undefined;
  return { latitude: s.latitude, longitude: s.longitude };
}
