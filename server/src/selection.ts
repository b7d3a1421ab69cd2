import type { MediaItem, SeriesItem } from './types.js';
import { pad2 } from './renamer.js';

export type SelectionState = 'checked' | 'unchecked' | 'partial';
export type NodeKind = 'root' | 'category' | 'show' | 'season' | 'file';

export interface SelectionNode {
  readonly id: string;
  readonly kind: NodeKind;
  readonly label: string;
  state: SelectionState;
  readonly children: SelectionNode[];
  parent: SelectionNode | null;
  /** Only on file nodes */
  readonly item?: MediaItem;
}

export interface SelectionNodeJSON {
  id: string;
  kind: NodeKind;
  label: string;
  state: SelectionState;
  children: SelectionNodeJSON[];
  sourcePath?: string;
  destPath?: string;
}

export type SelectionListener = (tree: SelectionTree) => void;

const byName = (a: string, b: string) => {
  const x = a.toLowerCase();
  const y = b.toLowerCase();
  return x < y ? -1 : x > y ? 1 : 0;
};

function aggregate(children: readonly SelectionNode[]): SelectionState {
  if (children.every(c => c.state === 'checked')) return 'checked';
  if (children.every(c => c.state === 'unchecked')) return 'unchecked';
  return 'partial';
}

/**
 * Category → show → season → file hierarchy over a plan, with tri-state
 * checkboxes. Selection truth lives here; renderers subscribe and redraw.
 */
export class SelectionTree {
  readonly root: SelectionNode;
  private readonly items: readonly MediaItem[];
  private readonly byId = new Map<string, SelectionNode>();
  private readonly leafByPath = new Map<string, SelectionNode>();
  private readonly listeners = new Set<SelectionListener>();
  private nextId = 0;

  private constructor(items: readonly MediaItem[]) {
    this.items = items;
    this.root = this.makeNode(null, 'root', 'All');
    this.populate();
  }

  static build(items: readonly MediaItem[]) {
    return new SelectionTree(items);
  }

  private makeNode(parent: SelectionNode | null, kind: NodeKind, label: string, item?: MediaItem) {
    const node: SelectionNode = { id: `n${this.nextId++}`, kind, label, state: 'checked', children: [], parent, item };
    if (parent) parent.children.push(node);
    this.byId.set(node.id, node);
    if (item) this.leafByPath.set(item.sourcePath, node);
    return node;
  }

  private populate() {
    const movies = this.items.filter(it => it.contentType === 'movie');
    const shows = new Map<string, Map<number, SeriesItem[]>>();
    let episodeCount = 0;
    for (const it of this.items) {
      if (it.contentType !== 'series') continue;
      const seasons = shows.get(it.showTitle) ?? new Map<number, SeriesItem[]>();
      shows.set(it.showTitle, seasons);
      const list = seasons.get(it.season) ?? [];
      seasons.set(it.season, list);
      list.push(it);
      episodeCount++;
    }

    if (movies.length) {
      const cat = this.makeNode(this.root, 'category', `Movies (${movies.length})`);
      for (const it of [...movies].sort((a, b) => byName(a.destFileName, b.destFileName))) {
        this.makeNode(cat, 'file', it.destFileName, it);
      }
    }

    if (shows.size) {
      const cat = this.makeNode(this.root, 'category', `Series (${episodeCount} files)`);
      for (const title of [...shows.keys()].sort(byName)) {
        const show = this.makeNode(cat, 'show', title);
        const seasons = shows.get(title) ?? new Map<number, SeriesItem[]>();
        for (const season of [...seasons.keys()].sort((a, b) => a - b)) {
          const seasonNode = this.makeNode(show, 'season', `Season ${pad2(season)}`);
          const eps = seasons.get(season) ?? [];
          for (const it of [...eps].sort((a, b) => byName(a.destFileName, b.destFileName))) {
            this.makeNode(seasonNode, 'file', it.destFileName, it);
          }
        }
      }
    }

    if (!this.root.children.length) this.root.state = 'unchecked';
  }

  find(id: string) {
    return this.byId.get(id);
  }

  /**
   * Flip `node` (partial flips to checked) or force it to `state`, push the
   * result down to every descendant and recompute every ancestor.
   */
  toggle(node: SelectionNode, state?: 'checked' | 'unchecked') {
    const next = state ?? (node.state === 'checked' ? 'unchecked' : 'checked');
    const setAll = (n: SelectionNode) => {
      n.state = next;
      for (const c of n.children) setAll(c);
    };
    setAll(node);
    for (let p = node.parent; p; p = p.parent) {
      p.state = aggregate(p.children);
    }
    for (const l of this.listeners) l(this);
  }

  /** Items whose leaf is checked, in plan order. */
  selectedLeaves(): MediaItem[] {
    return this.items.filter(it => this.leafByPath.get(it.sourcePath)?.state === 'checked');
  }

  hasSelection() {
    return this.items.some(it => this.leafByPath.get(it.sourcePath)?.state === 'checked');
  }

  subscribe(listener: SelectionListener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  toJSON(): SelectionNodeJSON {
    const walk = (n: SelectionNode): SelectionNodeJSON => {
      const out: SelectionNodeJSON = { id: n.id, kind: n.kind, label: n.label, state: n.state, children: n.children.map(walk) };
      if (n.item) {
        out.sourcePath = n.item.sourcePath;
        out.destPath = n.item.destPath;
      }
      return out;
    };
    return walk(this.root);
  }
}
