/**
 * Analyze service: the logic behind the /api/analyze routes
 */

import { AnalyzePayloadError, handleAnalyze, runAnalysis } from '@/lib/analyze-service';
import { DEFAULT_BETSCORE_CONFIG } from '@/lib/config/betscore-config';
import * as csvExport from '@/lib/csv-export';

const payload = {
  games: [
    {
      game_id: 'G1',
      league: 'NFL',
      date: '2025-10-12',
      home_team: 'Home Hawks',
      away_team: 'Road Rams',
      projection: { proj_home_pts: 24, proj_away_pts: 20, proj_total: 44 },
      market_lines: [
        { market: 'Moneyline', option: 'Home', current_line: -150 },
        { market: 'spread', option: 'home', current_line: -3.5, current_price: -110 },
      ],
      splits: [{ market: 'moneyline', option: 'home', public_pct: 60, money_pct: 75 }],
      experts: [
        { market: 'moneyline', option: 'home', count: 3 },
        { market: 'moneyline', option: 'away', count: 1 },
        { market: 'spread', option: 'home', count: 3 },
        { market: 'spread', option: 'away', count: 1 },
      ],
    },
  ],
};

const options = { config: DEFAULT_BETSCORE_CONFIG };

describe('runAnalysis', () => {
  test('returns both tables and both CSV renderings', () => {
    const result = runAnalysis(payload, options);

    expect(result.moneyline_table).toHaveLength(1);
    expect(result.moneyline_table[0].BetScore_ML_home).toBe(34.782);
    expect(result.spread_table[0].BetScore_ATS_home).toBe(8.286);
    expect(result.skipped).toEqual([]);
    expect(result.csv.moneyline.split('\r\n')[1]).toBe(
      'G1,NFL,2025-10-12,Road Rams,Home Hawks,0.707,0.6,0.107,3,1,60,75,0,0,34.782'
    );
  });

  test('throws AnalyzePayloadError with field detail on invalid input', () => {
    expect(() => runAnalysis({ games: [{ game_id: 'G1' }] }, options)).toThrow(AnalyzePayloadError);
  });
});

describe('handleAnalyze', () => {
  test('json format wraps the result', async () => {
    const response = await handleAnalyze(async () => payload, 'json', options);

    expect(response.kind).toBe('json');
    expect(response.status).toBe(200);
    if (response.kind === 'json' && response.body.success) {
      expect(response.body.moneyline_table[0].game_id).toBe('G1');
      expect(response.body.csv.spread.startsWith('game_id,league,date,away,home,spread_home,')).toBe(true);
    } else {
      throw new Error('expected a successful JSON response');
    }
  });

  test('csv-moneyline returns the moneyline CSV only', async () => {
    const response = await handleAnalyze(async () => payload, 'csv-moneyline', options);

    expect(response.kind).toBe('csv');
    expect(response.status).toBe(200);
    expect(String(response.body).startsWith('game_id,league,date,away,home,model_home_win_prob,')).toBe(true);
  });

  test('csv-spread returns the spread CSV only', async () => {
    const response = await handleAnalyze(async () => payload, 'csv-spread', options);

    expect(response.kind).toBe('csv');
    expect(String(response.body).split('\r\n')[1]).toBe(
      'G1,NFL,2025-10-12,Road Rams,Home Hawks,-3.5,-110,0.527,0.524,3,1,,,0,0,8.286'
    );
  });

  test('empty batch renders empty CSV', async () => {
    const response = await handleAnalyze(async () => ({ games: [] }), 'csv-spread', options);
    expect(response).toEqual({ kind: 'csv', status: 200, body: '' });
  });

  test('validation failure is a 422 with field-level detail', async () => {
    const response = await handleAnalyze(
      async () => ({ games: [{ ...payload.games[0], league: 7 }] }),
      'csv-moneyline',
      options
    );

    expect(response).toEqual({
      kind: 'json',
      status: 422,
      body: {
        success: false,
        error: 'Validation failed',
        detail: [{ loc: ['games', 0, 'league'], msg: 'Expected string, received number', type: 'invalid_type' }],
      },
    });
  });

  test('unparseable body is a 422', async () => {
    const response = await handleAnalyze(async () => {
      throw new SyntaxError('Unexpected token');
    }, 'json', options);

    expect(response.status).toBe(422);
    if (response.kind === 'json' && !response.body.success) {
      expect(response.body.detail?.[0].loc).toEqual(['body']);
    }
  });

  test('unexpected failures are a 500', async () => {
    const renderSpy = jest.spyOn(csvExport, 'tablesToCsv').mockImplementation(() => {
      throw new Error('render failed');
    });
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const response = await handleAnalyze(async () => payload, 'json', options);

    expect(response).toEqual({
      kind: 'json',
      status: 500,
      body: { success: false, error: 'analysis error: render failed' },
    });
    renderSpy.mockRestore();
    errorSpy.mockRestore();
  });
});
