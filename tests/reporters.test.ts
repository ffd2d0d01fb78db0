import * as jsonReporter from '../src/reporters/json';
import * as textReporter from '../src/reporters/text';
import { CatalogSource, TaskCatalog } from '../src/types';

const source: CatalogSource = {
  title: 'app (root)',
  workingDirectory: '/proj',
  manager: 'yarn',
  items: [
    { kind: 'command', id: 'install', description: 'Install packages' },
    { kind: 'script', name: 'build', command: 'tsc -p .' },
  ],
  manifest: {
    filepath: '/proj/package.json',
    manager: 'yarn',
    isRoot: true,
    projectName: 'app',
    scripts: new Map([['build', 'tsc -p .']]),
  },
};
const catalog: TaskCatalog = { manager: 'yarn', sources: [source] };

describe('Reporters', () => {
  describe('JSON Reporter', () => {
    it('should output the catalog with resolved commands', () => {
      expect(JSON.parse(jsonReporter.report(catalog))).toEqual({
        manager: 'yarn',
        sources: [
          {
            title: 'app (root)',
            cwd: '/proj',
            manager: 'yarn',
            isRoot: true,
            items: [
              {
                kind: 'command',
                id: 'install',
                description: 'Install packages',
                command: 'yarn install',
              },
              { kind: 'script', id: 'build', description: 'tsc -p .', command: 'yarn run build' },
            ],
          },
        ],
      });
    });

    it('should output an empty source list', () => {
      expect(JSON.parse(jsonReporter.report({ manager: 'npm', sources: [] }))).toEqual({
        manager: 'npm',
        sources: [],
      });
    });
  });

  describe('Text Reporter', () => {
    it('should head each source with its title, manager and directory', () => {
      const output = textReporter.report(catalog);
      expect(output.split('\n')[1]).toBe('app (root) [yarn] /proj');
    });

    it('should list every task and the command it runs', () => {
      const output = textReporter.report(catalog);
      const buildRow = output.split('\n').find((line) => line.includes('build'));
      expect(buildRow).toMatch(/build\s+│ tsc -p \.\s+│ yarn run build/);
      expect(output).toContain('yarn install');
    });

    it('should fall back to the directory for an untitled source', () => {
      const output = textReporter.report({ manager: 'yarn', sources: [{ ...source, title: '' }] });
      expect(output.split('\n')[1]).toBe('/proj [yarn] /proj');
    });

    it('should say so when there is nothing to run', () => {
      expect(textReporter.report({ manager: 'npm', sources: [] })).toBe('No package.json found.\n');
    });
  });
});
