import { describe, expect, it } from 'vitest';

import {
  formatLaunchNotice,
  formatPairIntroduction,
  formatSummary,
  isSummaryMessage,
  parseMention,
  parseSummary,
  renderMention,
} from './message-format';
import type { Participant } from './types';

const roster: Participant[] = [
  { id: 'U01AAAA', name: 'alice' },
  { id: 'U02BBBB', name: 'bob' },
  { id: 'U03CCCC', name: 'carol' },
];
const byId = new Map(roster.map((p) => [p.id, p]));

const FOOTER =
  'An uneven number of members results in one person getting two coffee matches. ' +
  'Matches from the last 28 days considered to avoid matching the same members several times in the time period.';

describe('renderMention / parseMention', () => {
  it('renders link and plain mentions', () => {
    expect(renderMention(roster[0], 'link')).toBe('<@U01AAAA>');
    expect(renderMention(roster[0], 'plain')).toBe('@alice');
  });

  it('parses mentions in the matching style only', () => {
    expect(parseMention('<@U01AAAA>', 'link')).toBe('U01AAAA');
    expect(parseMention('<@U01AAAA|alice>', 'link')).toBe('U01AAAA');
    expect(parseMention('@alice', 'plain')).toBe('alice');
    expect(parseMention('@alice', 'link')).toBeNull();
    expect(parseMention('<@U01AAAA>', 'plain')).toBeNull();
  });
});

describe('formatSummary', () => {
  it('returns null when there are no pairs', () => {
    expect(
      formatSummary([], byId, { magicalText: 'Coffees', lookbackDays: 28, mentionStyle: 'link' })
    ).toBeNull();
  });

  it('lists numbered pairs between the header and the footer', () => {
    const summary = formatSummary(
      [
        ['U01AAAA', 'U02BBBB'],
        ['U03CCCC', 'U01AAAA'],
      ],
      byId,
      { magicalText: 'This weeks random coffees are', lookbackDays: 28, mentionStyle: 'link' }
    );

    expect(summary).toBe(
      [
        'This weeks random coffees are:',
        ' 1. <@U01AAAA> and <@U02BBBB>',
        ' 2. <@U03CCCC> and <@U01AAAA>',
        FOOTER,
      ].join('\n')
    );
  });

  it('uses handles in plain style', () => {
    const summary = formatSummary([['U01AAAA', 'U02BBBB']], byId, {
      magicalText: 'Coffees',
      lookbackDays: 7,
      mentionStyle: 'plain',
    });

    expect(summary?.split('\n')[1]).toBe(' 1. @alice and @bob');
    expect(summary?.split('\n')[2]).toContain('Matches from the last 7 days considered');
  });
});

describe('parseSummary', () => {
  it('reads pairs back from a posted summary', () => {
    const text = [
      'This weeks random coffees are:',
      ' 1. <@U01AAAA> and <@U02BBBB>',
      ' 2. <@U03CCCC> and <@U01AAAA>',
      FOOTER,
    ].join('\n');

    expect(parseSummary(text, 'link')).toEqual([
      ['U01AAAA', 'U02BBBB'],
      ['U03CCCC', 'U01AAAA'],
    ]);
  });

  it('reads plain handles, including ones containing "and"', () => {
    const text = ['Coffees:', ' 1. @sandra and @andy', ' 2. @bob and @carol', 'footer'].join('\n');

    expect(parseSummary(text, 'plain')).toEqual([
      ['sandra', 'andy'],
      ['bob', 'carol'],
    ]);
  });

  it('skips lines that are not pairs', () => {
    const text = ['Coffees:', ' 1. <@U01AAAA> and someone', 'random chatter', ' 2. <@U02BBBB> and <@U03CCCC>'].join(
      '\n'
    );

    expect(parseSummary(text, 'link')).toEqual([['U02BBBB', 'U03CCCC']]);
  });
});

describe('isSummaryMessage', () => {
  it('requires the magical text and a mention in the active style', () => {
    expect(isSummaryMessage('Coffees:\n 1. <@U01AAAA> and <@U02BBBB>', 'Coffees', 'link')).toBe(true);
    expect(isSummaryMessage('Coffees:\n 1. @alice and @bob', 'Coffees', 'link')).toBe(false);
    expect(isSummaryMessage('Coffees:\n 1. @alice and @bob', 'Coffees', 'plain')).toBe(true);
    expect(isSummaryMessage('Hello <@U01AAAA>', 'Coffees', 'link')).toBe(false);
  });
});

describe('direct messages', () => {
  it('introduces the pair and links the channel', () => {
    expect(formatPairIntroduction(['U01AAAA', 'U02BBBB'], 'C123')).toBe(
      "Hello <@U01AAAA> and <@U02BBBB>\nYou've been randomly selected for <#C123>!\nTake some time to meet soon."
    );
  });

  it('announces the round size', () => {
    expect(formatLaunchNotice(3)).toBe('I just launched a new round of 3 pairs! Check your DMs.');
  });
});
