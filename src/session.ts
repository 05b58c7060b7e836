// Per-user conversation state for the advisory flow.
import { DEFAULT_LANG, type Lang } from './i18n.js';

export const STATES = [
  'START',
  'SELECT_LANGUAGE',
  'SETUP_AREA_TYPE',
  'SETUP_SELECT_DISTRICT',
  'SETUP_SELECT_TALUKA',
  'SETUP_SELECT_VILLAGE',
  'SETUP_SELECT_PLOT',
  'SETUP_SELECT_OWNER',
  'MAIN_MENU',
  'SOWING_COLLECT_CROP',
  'SOLVENCY_COLLECT_CROP',
] as const;

export type State = (typeof STATES)[number];

export type AreaType = 'U' | 'R';

export interface VillageChoice {
  gisCode: string;
  code?: string;
}

export interface OwnerChoice {
  name: string;
  areaAres: number;
}

/**
 * The list the user is answering with a bare number ("1", "2", ...).
 * Only one list is live at a time; issuing a new one replaces it.
 */
export type Selection =
  | { kind: 'district'; entries: Map<string, string> }
  | { kind: 'taluka'; entries: Map<string, string> }
  | { kind: 'village'; entries: Map<string, VillageChoice> }
  | { kind: 'owner'; entries: Map<string, OwnerChoice> };

export type SelectionKind = Selection['kind'];

export interface Session {
  state: State;
  language: Lang;
  languageSet: boolean;       // explicitly chosen, not just the default

  // Location, set once during setup and kept across flows
  area?: AreaType;
  districtCode?: string;
  talukaCode?: string;
  villageCode?: string;
  villageGisCode?: string;
  plotNo?: string;
  latitude?: number;
  longitude?: number;
  farmAreaAres?: number;
  ownerName?: string;
  plotOwners?: OwnerChoice[];
  locationSetupComplete: boolean;

  // Groundwater balance, cached at the end of setup
  waterBalanceValue?: number;
  waterBalanceData?: Record<string, unknown>;

  // Flow-scoped, cleared on soft reset
  crop?: string;
  availablePlots?: string[];
  selection?: Selection;
}

export function createSession(): Session {
  return {
    state: 'START',
    language: DEFAULT_LANG,
    languageSet: false,
    locationSetupComplete: false,
  };
}

function clearFlow(s: Session) {
  s.crop = undefined;
  s.availablePlots = undefined;
  s.selection = undefined;
}

/** Clears flow data, keeps language, location and balance. */
export function softReset(s: Session) {
  s.state = s.locationSetupComplete ? 'MAIN_MENU' : 'START';
  clearFlow(s);
}

/** Back to a brand new session. */
export function fullReset(s: Session) {
  clearFlow(s);
  s.state = 'START';
  s.language = DEFAULT_LANG;
  s.languageSet = false;
  s.area = undefined;
  s.districtCode = undefined;
  s.talukaCode = undefined;
  s.villageCode = undefined;
  s.villageGisCode = undefined;
  s.plotNo = undefined;
  s.latitude = undefined;
  s.longitude = undefined;
  s.farmAreaAres = undefined;
  s.ownerName = undefined;
  s.plotOwners = undefined;
  s.locationSetupComplete = false;
  s.waterBalanceValue = undefined;
  s.waterBalanceData = undefined;
}

export type ResumeState = Extract<State, 'MAIN_MENU' | 'SETUP_AREA_TYPE' | 'SELECT_LANGUAGE'>;

/** Where a session should be when it has no better state. */
export function resumeState(s: Session): ResumeState {
  if (s.locationSetupComplete) return 'MAIN_MENU';
  if (s.languageSet) return 'SETUP_AREA_TYPE';
  return 'SELECT_LANGUAGE';
}

export function issueSelection(s: Session, next: Selection) {
  s.selection = next;
}

export function resolveSelection(s: Session, kind: 'district' | 'taluka', key: string): string | undefined;
export function resolveSelection(s: Session, kind: 'village', key: string): VillageChoice | undefined;
export function resolveSelection(s: Session, kind: 'owner', key: string): OwnerChoice | undefined;
export function resolveSelection(
  s: Session,
  kind: SelectionKind,
  key: string
): string | VillageChoice | OwnerChoice | undefined {
  const sel = s.selection;
  if (!sel || sel.kind !== kind) return undefined;
  return sel.entries.get(key);
}

/** Numbered entries ("1" -> first item) for a list shown to the user. */
export function numbered<T>(items: readonly T[]): Map<string, T> {
  return new Map(items.map((item, i) => [String(i + 1), item]));
}

export interface CompletedLocation {
  latitude: number;
  longitude: number;
  farmAreaAres: number;
  ownerName: string;
  balance?: { value?: number; data: Record<string, unknown> };
}

/** The only way setup is marked complete: all values at once. */
export function completeLocationSetup(s: Session, loc: CompletedLocation) {
  s.latitude = loc.latitude;
  s.longitude = loc.longitude;
  s.farmAreaAres = loc.farmAreaAres;
  s.ownerName = loc.ownerName;
  if (loc.balance) {
    s.waterBalanceValue = loc.balance.value;
    s.waterBalanceData = loc.balance.data;
  }
  s.locationSetupComplete = true;
  s.selection = undefined;
  s.state = 'MAIN_MENU';
}

export type SessionSnapshot = Pick<
  Session,
  | 'state'
  | 'language'
  | 'languageSet'
  | 'locationSetupComplete'
  | 'area'
  | 'districtCode'
  | 'talukaCode'
  | 'villageGisCode'
  | 'plotNo'
  | 'ownerName'
  | 'farmAreaAres'
  | 'waterBalanceValue'
>;

export function snapshot(s: Session): SessionSnapshot {
  return {
    state: s.state,
    language: s.language,
    languageSet: s.languageSet,
    locationSetupComplete: s.locationSetupComplete,
    area: s.area,
    districtCode: s.districtCode,
    talukaCode: s.talukaCode,
    villageGisCode: s.villageGisCode,
    plotNo: s.plotNo,
    ownerName: s.ownerName,
    farmAreaAres: s.farmAreaAres,
    waterBalanceValue: s.waterBalanceValue,
  };
}
