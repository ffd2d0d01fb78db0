import { toExecutionRequest } from '../executor';
import { itemDescription, itemLabel } from '../selector';
import { TaskCatalog } from '../types';

export function report(catalog: TaskCatalog) {
  const sources = catalog.sources.map((source) => ({
    title: source.title,
    cwd: source.workingDirectory,
    manager: source.manager,
    isRoot: source.manifest.isRoot,
    items: source.items.map((item) => ({
      kind: item.kind,
      id: itemLabel(item),
      description: itemDescription(item),
      command: toExecutionRequest(source, item).command,
    })),
  }));
  return JSON.stringify({ manager: catalog.manager, sources }, null, 2);
}
