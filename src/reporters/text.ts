import Table from 'cli-table3';
import { toExecutionRequest } from '../executor';
import { itemDescription, itemLabel } from '../selector';
import { TaskCatalog } from '../types';

type Colorize = (s: string) => string;

export interface ReportContext {
  colors?: { bold: Colorize; dim: Colorize; cyan: Colorize; yellow: Colorize };
}

const plain = (s: string) => s;

export function report(catalog: TaskCatalog, context: ReportContext = {}) {
  // Fallback to uncoloured output if no chalk instance is provided
  const c = context.colors ?? { bold: plain, dim: plain, cyan: plain, yellow: plain };

  if (catalog.sources.length === 0) {
    return c.yellow('No package.json found.') + '\n';
  }

  let output = '';
  for (const source of catalog.sources) {
    const heading = source.title || source.workingDirectory;
    output += `\n${c.bold(heading)} ${c.dim(`[${source.manager}] ${source.workingDirectory}`)}\n`;

    const table = new Table({
      head: [c.bold('Task'), c.bold('Description'), c.bold('Runs')],
      style: {
        head: [], // We handle colors manually
        border: [],
      },
    });
    for (const item of source.items) {
      table.push([
        c.cyan(itemLabel(item)),
        itemDescription(item),
        c.dim(toExecutionRequest(source, item).command),
      ]);
    }
    output += table.toString() + '\n';
  }
  return output;
}
