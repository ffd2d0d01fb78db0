import chalk from 'chalk';
import inquirer from 'inquirer';
import { CatalogSource, PackageManager, SelectableItem, Selection } from './types';

export interface SelectOptions {
  manager: PackageManager;
}

/**
 * Presents the catalog and reports the user's choice; `undefined` means nothing was picked.
 */
export interface TaskSelector {
  select(sources: readonly CatalogSource[], options: SelectOptions): Promise<Selection | undefined>;
}

export function itemLabel(item: SelectableItem): string {
  return item.kind === 'command' ? item.id : item.name;
}

export function itemDescription(item: SelectableItem): string {
  return item.kind === 'command' ? item.description : item.command;
}

type Choice =
  | InstanceType<typeof inquirer.Separator>
  | { name: string; short: string; value: Selection | null };

export function buildChoices(sources: readonly CatalogSource[]): Choice[] {
  const choices: Choice[] = [];
  for (const source of sources) {
    const heading = source.title || source.workingDirectory;
    choices.push(new inquirer.Separator(chalk.bold(`── ${heading} · ${source.workingDirectory}`)));
    const width = Math.max(...source.items.map((item) => itemLabel(item).length));
    for (const item of source.items) {
      const label = itemLabel(item);
      choices.push({
        name: `${label.padEnd(width)}  ${chalk.dim(itemDescription(item))}`,
        short: label,
        value: { source, item },
      });
    }
  }
  choices.push(new inquirer.Separator());
  choices.push({ name: 'Cancel', short: 'Cancel', value: null });
  return choices;
}

export class InquirerSelector implements TaskSelector {
  constructor(private readonly pageSize = 20) {}

  async select(
    sources: readonly CatalogSource[],
    options: SelectOptions,
  ): Promise<Selection | undefined> {
    if (sources.length === 0) {
      return undefined;
    }
    const answer = await inquirer.prompt<{ selection: Selection | null }>([
      {
        type: 'list',
        name: 'selection',
        message: `Run task (${options.manager}):`,
        choices: buildChoices(sources),
        pageSize: this.pageSize,
        loop: false,
      },
    ]);
    return answer.selection ?? undefined;
  }
}
