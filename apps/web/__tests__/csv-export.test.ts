/**
 * CSV rendering: fixed column order, empty fields for unknowns, quoting
 */

import { analyzeGames } from '@/lib/analysis/analyze-games';
import {
  escapeCsvField,
  MONEYLINE_COLUMNS,
  moneylineToCsv,
  rowsToCsv,
  SPREAD_COLUMNS,
  spreadToCsv,
  tablesToCsv,
} from '@/lib/csv-export';
import { makeGame, makeReferenceGame } from './game-fixtures';

describe('escapeCsvField', () => {
  test('null and undefined render empty', () => {
    expect(escapeCsvField(null)).toBe('');
    expect(escapeCsvField(undefined)).toBe('');
  });

  test('numbers render as-is', () => {
    expect(escapeCsvField(0)).toBe('0');
    expect(escapeCsvField(-3.5)).toBe('-3.5');
  });

  test('commas, quotes, and newlines are quoted', () => {
    expect(escapeCsvField('St. Louis, MO')).toBe('"St. Louis, MO"');
    expect(escapeCsvField('The "A" Team')).toBe('"The ""A"" Team"');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
  });
});

describe('rowsToCsv', () => {
  test('empty collection renders an empty string, no header', () => {
    expect(rowsToCsv([], MONEYLINE_COLUMNS)).toBe('');
    expect(moneylineToCsv([])).toBe('');
    expect(spreadToCsv([])).toBe('');
  });

  test('unknown field renders as an empty field at its position', () => {
    const csv = rowsToCsv([{ a: 1, b: null, c: 'x' }], ['a', 'b', 'c']);
    expect(csv).toBe('a,b,c\r\n1,,x\r\n');
  });

  test('extra fields are ignored and missing ones render empty', () => {
    const csv = rowsToCsv([{ a: 1, extra: 'ignored' }], ['a', 'b']);
    expect(csv).toBe('a,b\r\n1,\r\n');
  });
});

describe('table rendering', () => {
  test('moneyline header follows the fixed column order', () => {
    const { moneyline } = analyzeGames([makeReferenceGame()]);
    const [header] = moneylineToCsv(moneyline).split('\r\n');

    expect(header).toBe(
      'game_id,league,date,away,home,model_home_win_prob,implied_home_ml_prob,edge_home_ml_prob,' +
        'experts_moneyline_home,experts_moneyline_away,public_home_ml_pct,money_home_ml_pct,' +
        'inj_home_total,inj_away_total,BetScore_ML_home'
    );
  });

  test('spread header follows the fixed column order', () => {
    expect(SPREAD_COLUMNS.join(',')).toBe(
      'game_id,league,date,away,home,spread_home,spread_home_price,model_home_cover,imp_home_cover,' +
        'experts_spread_home,experts_spread_away,public_home_spread_pct,money_home_spread_pct,' +
        'inj_home_total,inj_away_total,BetScore_ATS_home'
    );
  });

  test('reference game renders one line per table', () => {
    const { moneyline, spread } = analyzeGames([makeReferenceGame()]);
    const csv = tablesToCsv(moneyline, spread);

    expect(csv.moneyline.split('\r\n')[1]).toBe(
      'G1,NFL,2025-10-12,Road Rams,Home Hawks,0.707,0.6,0.107,3,1,60,75,0,0,34.782'
    );
    expect(csv.spread.split('\r\n')[1]).toBe(
      'G1,NFL,2025-10-12,Road Rams,Home Hawks,-3.5,-110,0.527,0.524,3,1,,,0,0,8.286'
    );
  });

  test('rows appear in sorted order', () => {
    const { moneyline } = analyzeGames([makeGame({ game_id: 'LOW' }), makeReferenceGame({ game_id: 'HIGH' })]);
    const lines = moneylineToCsv(moneyline).split('\r\n');

    expect(lines).toHaveLength(4);
    expect(lines[1].startsWith('HIGH,')).toBe(true);
    expect(lines[2].startsWith('LOW,')).toBe(true);
    expect(lines[3]).toBe('');
  });
});
