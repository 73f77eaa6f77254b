import { describe, it, expect } from 'vitest';
import { extractPlayerStats } from '../../../src/services/seasonStats/boxscoreExtractor';
import {
  athlete,
  defensiveLine,
  fumblesLine,
  gameSummary,
  interceptionsLine,
  passingLine,
  receivingLine,
  rushingLine,
  teamBlock,
} from '../../fixtures/factories';

describe('extractPlayerStats', () => {
  it('maps every category by column position', () => {
    const payload = gameSummary(
      {
        id: '1',
        name: 'Home Team',
        groups: {
          passing: [athlete('101', passingLine('22/31', '250', '2', '1', '3'), 'QB One')],
          rushing: [athlete('102', rushingLine('18', '96', '1', '23'), 'RB One')],
          receiving: [athlete('103', receivingLine('7', '88', '1', '31', '9'), 'WR One')],
        },
      },
      {
        id: '2',
        name: 'Away Team',
        groups: {
          fumbles: [athlete('201', fumblesLine('2', '1', '0'), 'RB Two')],
          defensive: [athlete('202', defensiveLine('9', '6', '1', '2', '1', '3', '0'), 'LB Two')],
          interceptions: [athlete('203', interceptionsLine('1', '42', '1'), 'CB Two')],
        },
      },
    );

    const records = extractPlayerStats(payload);

    expect(records.passing).toEqual([
      {
        team_id: '1',
        team_name: 'Home Team',
        player_id: '101',
        player_name: 'QB One',
        player_headshot_url: 'https://img.test/101.png',
        completions_attempts: '22/31',
        passing_yards: 250,
        passing_touchdowns: 2,
        interceptions: 1,
        sacks: 3,
      },
    ]);
    expect(records.rushing[0]).toMatchObject({
      player_id: '102',
      rushing_attempts: 18,
      rushing_yards: 96,
      rushing_touchdowns: 1,
      longest_run: 23,
    });
    expect(records.receiving[0]).toMatchObject({
      player_id: '103',
      receptions: 7,
      receiving_yards: 88,
      receiving_touchdowns: 1,
      longest_reception: 31,
      targets: 9,
    });
    expect(records.fumbles[0]).toMatchObject({
      team_id: '2',
      team_name: 'Away Team',
      player_id: '201',
      fumbles: 2,
      fumbles_lost: 1,
      fumbles_recovered: 0,
    });
    expect(records.defensive[0]).toMatchObject({
      player_id: '202',
      total_tackles: 9,
      solo_tackles: 6,
      sacks: 1,
      tackles_for_loss: 2,
      passes_defended: 1,
      qb_hits: 3,
      defensive_touchdowns: 0,
    });
    expect(records.interceptions[0]).toMatchObject({
      player_id: '203',
      interceptions: 1,
      interception_yards: 42,
      interception_touchdowns: 1,
    });
  });

  it('turns unreadable tokens into null without dropping the record', () => {
    const records = extractPlayerStats(
      gameSummary({
        id: '1',
        name: 'Home Team',
        groups: {
          passing: [athlete('101', passingLine('20/28', '1,045', '--', '0', '2-14'))],
          rushing: [athlete('102', ['12', 'n/a', '4.1', '1', '--'])],
        },
      }),
    );

    expect(records.passing[0]).toMatchObject({
      completions_attempts: '20/28',
      passing_yards: 1045,
      passing_touchdowns: null,
      interceptions: 0,
      sacks: null,
    });
    expect(records.rushing[0]).toMatchObject({
      rushing_attempts: 12,
      rushing_yards: null,
      rushing_touchdowns: 1,
      longest_run: null,
    });
  });

  it('fills missing trailing columns with null', () => {
    const records = extractPlayerStats(
      gameSummary({ id: '1', name: 'Home Team', groups: { receiving: [athlete('103', ['5', '60'])] } }),
    );

    expect(records.receiving[0]).toMatchObject({
      receptions: 5,
      receiving_yards: 60,
      receiving_touchdowns: null,
      longest_reception: null,
      targets: null,
    });
  });

  it('keeps a plain completions count as its string form', () => {
    const records = extractPlayerStats(
      gameSummary({ id: '1', name: 'Home Team', groups: { passing: [athlete('101', [17, '150'])] } }),
    );

    expect(records.passing[0]?.completions_attempts).toBe('17');
  });

  it('skips statistic groups it does not know', () => {
    const records = extractPlayerStats(
      gameSummary({
        id: '1',
        name: 'Home Team',
        groups: {
          kicking: [athlete('301', ['2/2', '100.0', '48'])],
          punting: [athlete('302', ['4', '180'])],
        },
      }),
    );

    expect(Object.values(records).every((list) => list.length === 0)).toBe(true);
  });

  it('stringifies numeric ids and nulls absent identity fields', () => {
    const payload = {
      boxscore: {
        players: [
          {
            statistics: [
              {
                name: 'rushing',
                athletes: [
                  { athlete: { id: 4242, displayName: 'Numeric Id' }, stats: ['3', '9', '3.0', '0', '5'] },
                  { stats: ['1', '2', '2.0', '0', '2'] },
                ],
              },
            ],
          },
        ],
      },
    };

    const records = extractPlayerStats(payload);

    expect(records.rushing).toHaveLength(2);
    expect(records.rushing[0]).toMatchObject({
      team_id: null,
      team_name: null,
      player_id: '4242',
      player_name: 'Numeric Id',
      player_headshot_url: null,
    });
    expect(records.rushing[1]).toMatchObject({ player_id: null, player_name: null, rushing_yards: 2 });
  });

  it('accepts a bare box score', () => {
    const bare = {
      players: [
        teamBlock({ id: '7', name: 'Bare Team', groups: { fumbles: [athlete('55', fumblesLine('1', '1', '0'))] } }),
      ],
    };

    expect(extractPlayerStats(bare).fumbles[0]).toMatchObject({ team_id: '7', player_id: '55', fumbles_lost: 1 });
  });

  it.each([null, 'not json', 42, { boxscore: {} }, { boxscore: { players: 'nope' } }])(
    'returns empty categories for an unusable payload (%j)',
    (payload) => {
      const records = extractPlayerStats(payload);
      expect(Object.values(records).every((list) => list.length === 0)).toBe(true);
    },
  );

  it('skips malformed groups and athletes but keeps the rest', () => {
    const payload = {
      boxscore: {
        players: [
          'garbage',
          {
            team: { id: '1', displayName: 'Home Team' },
            statistics: [
              { athletes: [] },
              { name: 'rushing', athletes: [null, { athlete: { id: '9' }, stats: 'oops' }] },
            ],
          },
        ],
      },
    };

    const records = extractPlayerStats(payload);

    expect(records.rushing).toEqual([
      {
        team_id: '1',
        team_name: 'Home Team',
        player_id: '9',
        player_name: null,
        player_headshot_url: null,
        rushing_attempts: null,
        rushing_yards: null,
        rushing_touchdowns: null,
        longest_run: null,
      },
    ]);
  });
});
