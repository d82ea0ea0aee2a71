import React, { useCallback, useEffect, useMemo, useState } from 'react';
import type { FileTreeNode } from '../../types/session';
import { ancestorFolders, flattenFileTree, getFileIcon } from '../../utils/coder/fileTree';

const NODE_PADDING_LEFT = 12;

interface FileTreeProps {
  tree: FileTreeNode[];
  selectedFile: string | null;
  /** File the generator is currently writing, highlighted while it streams. */
  activeFile?: string | null;
  onSelect: (path: string) => void;
}

export const FileTree: React.FC<FileTreeProps> = ({ tree, selectedFile, activeFile = null, onSelect }) => {
  const [expandedFolders, setExpandedFolders] = useState<Set<string>>(() => new Set());

  // reveal the selected file when it changes
  useEffect(() => {
    if (!selectedFile) return;
    const ancestors = ancestorFolders(selectedFile);
    if (ancestors.length === 0) return;
    setExpandedFolders(prev => {
      if (ancestors.every(folder => prev.has(folder))) return prev;
      const next = new Set(prev);
      ancestors.forEach(folder => next.add(folder));
      return next;
    });
  }, [selectedFile]);

  const toggleFolder = useCallback((path: string) => {
    setExpandedFolders(prev => {
      const next = new Set(prev);
      if (next.has(path)) {
        next.delete(path);
      } else {
        next.add(path);
      }
      return next;
    });
  }, []);

  const rows = useMemo(() => flattenFileTree(tree, expandedFolders), [tree, expandedFolders]);

  if (rows.length === 0) {
    return <div className="file-tree file-tree--empty">No files yet</div>;
  }

  return (
    <div className="file-tree" role="tree">
      {rows.map(({ node, depth }) => {
        const style = { paddingLeft: `${6 + depth * NODE_PADDING_LEFT}px` };

        if (node.type === 'folder') {
          const isOpen = expandedFolders.has(node.path);
          return (
            <button
              key={`d:${node.path}`}
              type="button"
              role="treeitem"
              aria-expanded={isOpen}
              className="file-tree__item file-tree__folder"
              style={style}
              onClick={() => toggleFolder(node.path)}
            >
              <span className="file-tree__icon">{isOpen ? '📂' : '📁'}</span>
              <span className="file-tree__name">{node.name}</span>
            </button>
          );
        }

        const classes = ['file-tree__item', 'file-tree__file'];
        if (node.path === selectedFile) classes.push('file-tree__item--selected');
        if (node.path === activeFile) classes.push('file-tree__item--writing');

        return (
          <button
            key={`f:${node.path}`}
            type="button"
            role="treeitem"
            aria-selected={node.path === selectedFile}
            className={classes.join(' ')}
            style={style}
            title={node.path}
            onClick={() => onSelect(node.path)}
          >
            <span className="file-tree__icon">{getFileIcon(node.path)}</span>
            <span className="file-tree__name">{node.name}</span>
          </button>
        );
      })}
    </div>
  );
};
