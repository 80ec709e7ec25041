import { describe, expect, it } from 'vitest';
import { formatTableSettingsHelp } from '../src/index.js';

describe('formatTableSettingsHelp', () => {
  it('lists every table setting with its default and documentation', () => {
    const lines = formatTableSettingsHelp().split('\n');

    expect(lines.slice(0, 6)).toEqual([
      'Table settings (topic.<topic>.<keyspace>.<table>.<setting>):',
      '',
      '  mapping (string, required, importance high)',
      "      Mapping of record fields to table columns, in the form of 'col1=value.f1, col2=key.f1'",
      '  deletesEnabled (boolean, default true, importance high)',
      '      Whether to delete rows where only the primary key is non-null',
    ]);
    expect(lines).toContain('  consistencyLevel (string, default LOCAL_ONE, importance high)');
    expect(lines).toContain('  ttl (int, default -1, importance high)');
    expect(lines).toHaveLength(13);
  });

  it('renders only the given descriptions', () => {
    const text = formatTableSettingsHelp([
      {
        name: 'ttl',
        path: 'topic.t.ks.tbl.ttl',
        type: 'int',
        defaultValue: '60',
        importance: 'low',
        documentation: 'Row expiry',
      },
    ]);

    expect(text).toBe(
      'Table settings (topic.<topic>.<keyspace>.<table>.<setting>):\n\n  ttl (int, default 60, importance low)\n      Row expiry\n'
    );
  });
});
