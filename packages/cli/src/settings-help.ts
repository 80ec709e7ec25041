import { describeTableSettings, type TableSettingDescription } from '@cqlsink/sink-config';

function describeOne(description: TableSettingDescription): string[] {
  const requirement =
    description.defaultValue === undefined ? 'required' : `default ${description.defaultValue}`;
  return [
    `  ${description.name} (${description.type}, ${requirement}, importance ${description.importance})`,
    `      ${description.documentation}`,
  ];
}

/** Text listing of the per-table settings, printed by `cqlsink settings` */
export function formatTableSettingsHelp(descriptions = describeTableSettings()): string {
  return [
    'Table settings (topic.<topic>.<keyspace>.<table>.<setting>):',
    '',
    ...descriptions.flatMap(describeOne),
    '',
  ].join('\n');
}
