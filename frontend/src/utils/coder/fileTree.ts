// status: complete
import type { FileTreeNode } from '../../types/session';

interface MutableFolder {
  folders: Map<string, MutableFolder>;
  files: Map<string, string>;
}

const emptyFolder = (): MutableFolder => ({ folders: new Map(), files: new Map() });

const joinTreePath = (parent: string, name: string) => (parent ? `${parent}/${name}` : name);

function toNodes(folder: MutableFolder, parentPath: string): FileTreeNode[] {
  const folders: FileTreeNode[] = Array.from(folder.folders.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, child]) => {
      const path = joinTreePath(parentPath, name);
      return { type: 'folder', name, path, children: toNodes(child, path) };
    });

  const files: FileTreeNode[] = Array.from(folder.files.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, path]) => ({ type: 'file', name, path }));

  return [...folders, ...files];
}

/**
 * Projects flat file paths into nested folder/file nodes: folders first, then files,
 * each level sorted by name. Recomputed from the store's key set on every change.
 */
export function buildFileTree(paths: Iterable<string>): FileTreeNode[] {
  const root = emptyFolder();

  for (const filePath of paths) {
    const parts = filePath.split('/').filter(part => part !== '');
    if (parts.length === 0) continue;

    let current = root;
    parts.slice(0, -1).forEach(part => {
      let next = current.folders.get(part);
      if (!next) {
        next = emptyFolder();
        current.folders.set(part, next);
      }
      current = next;
    });
    current.files.set(parts[parts.length - 1], filePath);
  }

  return toNodes(root, '');
}

export interface FlattenedTreeRow {
  node: FileTreeNode;
  depth: number;
}

/** Depth-first rows for rendering; children of collapsed folders are skipped. */
export function flattenFileTree(nodes: FileTreeNode[], expanded: ReadonlySet<string>, depth = 0): FlattenedTreeRow[] {
  const rows: FlattenedTreeRow[] = [];
  for (const node of nodes) {
    rows.push({ node, depth });
    if (node.type === 'folder' && expanded.has(node.path)) {
      rows.push(...flattenFileTree(node.children, expanded, depth + 1));
    }
  }
  return rows;
}

/** Every folder that leads to `filePath`, e.g. `a/b/c.ts` -> [`a`, `a/b`]. */
export function ancestorFolders(filePath: string): string[] {
  const parts = filePath.split('/').filter(Boolean);
  const out: string[] = [];
  for (let i = 1; i < parts.length; i++) {
    out.push(parts.slice(0, i).join('/'));
  }
  return out;
}

const LANGUAGE_BY_EXTENSION: Record<string, string> = {
  js: 'javascript',
  jsx: 'javascript',
  ts: 'typescript',
  tsx: 'typescript',
  py: 'python',
  html: 'html',
  css: 'css',
  scss: 'scss',
  json: 'json',
  md: 'markdown',
  sql: 'sql',
  sh: 'bash',
  bash: 'bash',
  txt: 'plaintext',
};

const ICON_BY_EXTENSION: Record<string, string> = {
  py: '🐍',
  js: '📜',
  html: '🌐',
  css: '🎨',
  json: '📋',
  md: '📝',
  txt: '📄',
};

const extensionOf = (filePath: string): string => {
  const name = filePath.split('/').pop() ?? '';
  const dot = name.lastIndexOf('.');
  return dot > 0 ? name.slice(dot + 1).toLowerCase() : '';
};

export const getLanguageForPath = (filePath: string): string =>
  LANGUAGE_BY_EXTENSION[extensionOf(filePath)] ?? 'plaintext';

export const getFileIcon = (filePath: string): string => ICON_BY_EXTENSION[extensionOf(filePath)] ?? '📄';
