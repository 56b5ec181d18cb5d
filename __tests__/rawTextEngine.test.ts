import {
  RawTextEngine,
  extractStationCode,
  rejectNonReport,
} from '../src/upstream/rawTextEngine';
import { ReportParseError } from '../src/upstream/types';
import { METAR_KJFK, TAF_KJFK, TEST_STATIONS, createFakeClock } from './support/fixtures';

const [KJFK] = TEST_STATIONS;

describe('RawTextEngine', () => {
  const { clock } = createFakeClock();
  const engine = new RawTextEngine(clock);

  it('splits a METAR into time, body and remarks', () => {
    expect(engine.parse(METAR_KJFK, KJFK, { reportType: 'metar', options: [] })).toEqual({
      raw: METAR_KJFK,
      station: 'KJFK',
      type: 'metar',
      time: { repr: '141151Z', dt: '2024-05-14T11:51:00.000Z' },
      validity: null,
      body: '21012KT 10SM FEW250 24/14 A3002',
      remarks: 'AO2 SLP166',
    });
  });

  it('reads the validity period of a TAF and folds its lines', () => {
    expect(engine.parse(TAF_KJFK, KJFK, { reportType: 'taf', options: [] })).toEqual({
      raw: 'TAF KJFK 141120Z 1412/1518 21012KT P6SM FEW250 FM141800 22015G22KT P6SM SCT050',
      station: 'KJFK',
      type: 'taf',
      time: { repr: '141120Z', dt: '2024-05-14T11:20:00.000Z' },
      validity: '1412/1518',
      body: '21012KT P6SM FEW250 FM141800 22015G22KT P6SM SCT050',
      remarks: null,
    });
  });

  it('places a report day later than today in the previous month', () => {
    const parsed = engine.parse('KJFK 281151Z 21012KT', KJFK, { reportType: 'metar', options: [] });

    expect(parsed.time).toEqual({ repr: '281151Z', dt: '2024-04-28T11:51:00.000Z' });
  });

  it('rejects a report for another station', () => {
    expect(() =>
      engine.parse('KLGA 141151Z 21012KT', KJFK, { reportType: 'metar', options: [] }),
    ).toThrow(new ReportParseError('Report is for KLGA, expected KJFK', 'KLGA 141151Z 21012KT'));
  });

  it('requires an issue time on a METAR', () => {
    expect(() =>
      engine.parse('KJFK 21012KT 10SM', KJFK, { reportType: 'metar', options: [] }),
    ).toThrow('Could not find the issue time in the METAR for KJFK');
  });

  it('rejects text that is not a report', () => {
    expect(() => engine.parse('{"raw": 1}', KJFK, { reportType: 'metar', options: [] })).toThrow(
      ReportParseError,
    );
  });
});

describe('report text helpers', () => {
  it('finds the station code after report prefixes', () => {
    expect(extractStationCode('METAR COR kjfk 141151Z')).toBe('KJFK');
    expect(extractStationCode('SPECI')).toBeNull();
    expect(extractStationCode('hello world')).toBeNull();
  });

  it('flags short and structured input', () => {
    expect(rejectNonReport('KJF')).toBe("Doesn't look like the raw report string");
    expect(rejectNonReport('[KJFK]')).toBe("Doesn't look like the raw report string");
    expect(rejectNonReport(METAR_KJFK)).toBeNull();
  });
});
