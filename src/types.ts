export const KNOWN_PACKAGE_MANAGERS = ['npm', 'yarn', 'pnpm', 'bun'] as const;

export type KnownPackageManager = (typeof KNOWN_PACKAGE_MANAGERS)[number];

// Anything beyond the known four comes from user configuration.
export type PackageManager = KnownPackageManager | (string & {});

export interface LockfileMapping {
    file: string;
    manager: PackageManager;
}

export interface CommandSpec {
    id: string;
    description: string;
}

export interface ManifestData {
    projectName?: string;
    scripts: Map<string, string>; // script name -> command text, declared order
}

export interface ManifestRecord extends ManifestData {
    filepath: string;
    manager: PackageManager;
    isRoot: boolean;
}

export interface FixedCommandItem {
    kind: 'command';
    id: string;
    description: string;
}

export interface ScriptItem {
    kind: 'script';
    name: string;
    command: string;
}

export type SelectableItem = FixedCommandItem | ScriptItem;

export interface CatalogSource {
    title: string;
    items: SelectableItem[];
    workingDirectory: string;
    manager: PackageManager;
    manifest: ManifestRecord;
}

export interface TaskCatalog {
    manager: PackageManager;
    sources: CatalogSource[];
}

export interface Selection {
    source: CatalogSource;
    item: SelectableItem;
}

export interface ExecutionRequest {
    cwd: string;
    manager: PackageManager;
    args: string[];
    command: string;
}
