/**
 * Path-segment trie for longest-prefix ownership lookup
 *
 * Keys are split on '/', so org/repo/api is a prefix of org/repo/api/v2
 * but not of org/repo/apis.
 */

/**
 * Trie node, one per path segment
 */
interface TrieNode<T> {
  children: Map<string, TrieNode<T>>;
  /** Set when a key ends at this node */
  value?: T;
  hasValue: boolean;
}

/**
 * Result of a longest-prefix lookup
 */
export interface PrefixMatch<T> {
  /** The inserted key that matched */
  prefix: string;
  value: T;
}

function createNode<T>(): TrieNode<T> {
  return { children: new Map(), hasValue: false };
}

function splitSegments(key: string): string[] {
  return key.split('/').filter((segment) => segment.length > 0);
}

/**
 * Remove a trailing declaration file segment: org/repo/a/OWNERS -> org/repo/a
 */
export function stripDeclarationFile(filePath: string, fileName: string): string {
  const suffix = `/${fileName}`;
  if (filePath.endsWith(suffix)) {
    return filePath.slice(0, -suffix.length);
  }
  return filePath === fileName ? '' : filePath;
}

export class PrefixTrie<T> {
  private root: TrieNode<T> = createNode();
  private count = 0;

  /** Number of keys stored */
  get size(): number {
    return this.count;
  }

  /**
   * Insert or replace the value for a key
   */
  insert(key: string, value: T): void {
    let current = this.root;

    for (const segment of splitSegments(key)) {
      let child = current.children.get(segment);
      if (!child) {
        child = createNode();
        current.children.set(segment, child);
      }
      current = child;
    }

    if (!current.hasValue) {
      this.count++;
    }
    current.value = value;
    current.hasValue = true;
  }

  /**
   * Exact lookup
   */
  get(key: string): T | undefined {
    let current: TrieNode<T> | undefined = this.root;
    for (const segment of splitSegments(key)) {
      current = current.children.get(segment);
      if (!current) {
        return undefined;
      }
    }
    return current.hasValue ? current.value : undefined;
  }

  /**
   * Deepest inserted key that is an ancestor-or-self of path
   */
  longestPrefix(path: string): PrefixMatch<T> | null {
    const segments = splitSegments(path);
    let current = this.root;
    let best: PrefixMatch<T> | null = null;

    if (current.hasValue && current.value !== undefined) {
      best = { prefix: '', value: current.value };
    }

    for (let i = 0; i < segments.length; i++) {
      const child = current.children.get(segments[i]);
      if (!child) {
        break;
      }
      current = child;
      if (current.hasValue && current.value !== undefined) {
        best = { prefix: segments.slice(0, i + 1).join('/'), value: current.value };
      }
    }

    return best;
  }
}
