/**
 * Connected-component bookkeeping
 *
 * Each vertex carries a component token; tokens are grouped by a union-find
 * forest. Only handle attachment joins components and no operator splits one.
 * No path compression: undo restores only the parent recorded by `union`.
 */

/**
 * A union as recorded for undo
 */
export interface UnionRecord {
  /** Root that was attached below `root` */
  readonly child: number;
  readonly root: number;
  /** Rank of `root` before the union */
  readonly rootRank: number;
}

export class ComponentForest {
  private _parent: number[] = [];
  private _rank: number[] = [];

  /**
   * Create a new singleton token
   */
  add(): number {
    const token = this._parent.length;
    this._parent.push(token);
    this._rank.push(0);
    return token;
  }

  /**
   * Drop the most recently added token (undo of `add`)
   */
  removeLast(token: number): void {
    if (token === this._parent.length - 1 && this._parent[token] === token) {
      this._parent.pop();
      this._rank.pop();
    }
  }

  find(token: number): number {
    let current = token;
    while (this._parent[current] !== current) {
      current = this._parent[current];
    }
    return current;
  }

  same(a: number, b: number): boolean {
    return this.find(a) === this.find(b);
  }

  /**
   * Join the groups of `a` and `b` (union by rank)
   *
   * @returns The record needed to undo the union, or null if already joined
   */
  union(a: number, b: number): UnionRecord | null {
    let root = this.find(a);
    let child = this.find(b);
    if (root === child) return null;
    if (this._rank[root] < this._rank[child]) {
      [root, child] = [child, root];
    }
    const record: UnionRecord = { child, root, rootRank: this._rank[root] };
    this._parent[child] = root;
    if (this._rank[root] === this._rank[child]) {
      this._rank[root]++;
    }
    return record;
  }

  revert(record: UnionRecord): void {
    this._parent[record.child] = record.child;
    this._rank[record.root] = record.rootRank;
  }
}
