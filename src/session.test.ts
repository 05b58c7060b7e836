import { describe, expect, it } from 'vitest';
import {
  completeLocationSetup,
  createSession,
  fullReset,
  issueSelection,
  numbered,
  resolveSelection,
  resumeState,
  snapshot,
  softReset,
} from './session.js';

function completed() {
  const s = createSession();
  s.language = 'hi';
  s.languageSet = true;
  s.area = 'R';
  s.districtCode = 'D1';
  s.talukaCode = 'T1';
  s.villageGisCode = 'G1';
  s.plotNo = '12';
  completeLocationSetup(s, {
    latitude: 18.5,
    longitude: 73.8,
    farmAreaAres: 40,
    ownerName: 'Asha Patil',
    balance: { value: 5000, data: { balance: 5000 } },
  });
  return s;
}

describe('session', () => {
  it('starts at START with the default language', () => {
    const s = createSession();
    expect(s.state).toBe('START');
    expect(s.language).toBe('en');
    expect(s.languageSet).toBe(false);
    expect(s.locationSetupComplete).toBe(false);
    expect(resumeState(s)).toBe('SELECT_LANGUAGE');
  });

  it('completes setup with every location value at once', () => {
    const s = completed();
    expect(s.state).toBe('MAIN_MENU');
    expect(s.locationSetupComplete).toBe(true);
    expect(s.latitude).toBe(18.5);
    expect(s.longitude).toBe(73.8);
    expect(s.farmAreaAres).toBe(40);
    expect(s.ownerName).toBe('Asha Patil');
    expect(s.waterBalanceValue).toBe(5000);
    expect(resumeState(s)).toBe('MAIN_MENU');
  });

  it('soft reset clears flow data and keeps location', () => {
    const s = completed();
    s.state = 'SOLVENCY_COLLECT_CROP';
    s.crop = 'wheat';
    s.availablePlots = ['1'];
    issueSelection(s, { kind: 'district', entries: numbered(['D9']) });

    softReset(s);
    expect(s.state).toBe('MAIN_MENU');
    expect(s.crop).toBeUndefined();
    expect(s.availablePlots).toBeUndefined();
    expect(s.selection).toBeUndefined();
    expect(s.ownerName).toBe('Asha Patil');
    expect(s.waterBalanceValue).toBe(5000);
  });

  it('soft reset before setup goes back to START', () => {
    const s = createSession();
    s.languageSet = true;
    s.state = 'SETUP_SELECT_TALUKA';
    softReset(s);
    expect(s.state).toBe('START');
    expect(resumeState(s)).toBe('SETUP_AREA_TYPE');
  });

  it('full reset clears everything', () => {
    const s = completed();
    fullReset(s);
    expect(s).toEqual(createSession());
  });

  it('resolves only against the live selection of the same kind', () => {
    const s = createSession();
    issueSelection(s, { kind: 'district', entries: numbered(['D1', 'D2']) });
    expect(resolveSelection(s, 'district', '2')).toBe('D2');
    expect(resolveSelection(s, 'district', '3')).toBeUndefined();
    expect(resolveSelection(s, 'taluka', '1')).toBeUndefined();

    issueSelection(s, { kind: 'taluka', entries: numbered(['T1']) });
    expect(resolveSelection(s, 'district', '1')).toBeUndefined();
    expect(resolveSelection(s, 'taluka', '1')).toBe('T1');
  });

  it('replaces an earlier list of the same kind', () => {
    const s = createSession();
    issueSelection(s, { kind: 'district', entries: numbered(['D1', 'D2']) });
    issueSelection(s, { kind: 'district', entries: numbered(['D7']) });
    expect(resolveSelection(s, 'district', '1')).toBe('D7');
    expect(resolveSelection(s, 'district', '2')).toBeUndefined();
  });

  it('numbers entries from 1', () => {
    expect([...numbered(['a', 'b'])]).toEqual([
      ['1', 'a'],
      ['2', 'b'],
    ]);
  });

  it('snapshots the public fields', () => {
    const snap = snapshot(completed());
    expect(snap).toEqual({
      state: 'MAIN_MENU',
      language: 'hi',
      languageSet: true,
      locationSetupComplete: true,
      area: 'R',
      districtCode: 'D1',
      talukaCode: 'T1',
      villageGisCode: 'G1',
      plotNo: '12',
      ownerName: 'Asha Patil',
      farmAreaAres: 40,
      waterBalanceValue: 5000,
    });
  });
});
