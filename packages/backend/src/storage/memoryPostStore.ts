/**
 * @description: Process-local post store guarded by a read-write lock. Data is lost on restart.
 * @scope: backend
 * @module: MemoryPostStore
 * @risk: high - Id assignment and mutation races would corrupt every response.
 */
import { clonePost, type Post, type PostDraft } from '../models/post';
import { PostNotFoundError } from '../shared/errors';
import { ReadWriteLock } from '../utils/readWriteLock';
import type { PostStore } from './postStore';

type MemoryPostStoreOptions = {
  now?: () => Date;
};

// --- Search helpers ---
const matchesTerm = (post: Post, lowerTerm: string): boolean =>
  post.title.toLowerCase().includes(lowerTerm) ||
  post.content.toLowerCase().includes(lowerTerm) ||
  post.category.toLowerCase().includes(lowerTerm);

// --- Store factory ---
const createMemoryPostStore = ({ now = () => new Date() }: MemoryPostStoreOptions = {}): PostStore => {
  const lock = new ReadWriteLock();
  const posts = new Map<number, Post>();
  // Ids start at 1 and never go backwards, so deleted ids are never handed out again.
  let nextId = 1;

  const create = (draft: PostDraft): Promise<number> =>
    lock.withWrite(() => {
      const id = nextId;
      nextId += 1;

      const timestamp = now();
      posts.set(id, {
        id,
        title: draft.title,
        content: draft.content,
        category: draft.category,
        tags: [...draft.tags],
        createdAt: new Date(timestamp.getTime()),
        updatedAt: new Date(timestamp.getTime())
      });

      return id;
    });

  const get = (id: number): Promise<Post> =>
    lock.withRead(() => {
      const post = posts.get(id);
      if (!post) {
        throw new PostNotFoundError(id);
      }
      return clonePost(post);
    });

  const list = (term: string): Promise<Post[]> =>
    lock.withRead(() => {
      const lowerTerm = term.toLowerCase();
      const matches: Post[] = [];

      // Full scan per call; fine for a process-local store.
      for (const post of posts.values()) {
        if (lowerTerm === '' || matchesTerm(post, lowerTerm)) {
          matches.push(clonePost(post));
        }
      }

      return matches;
    });

  const update = (id: number, draft: PostDraft): Promise<Post> =>
    lock.withWrite(() => {
      const existing = posts.get(id);
      if (!existing) {
        throw new PostNotFoundError(id);
      }

      // A clock step backwards must not put updatedAt before the previous value.
      const timestamp = now();
      const updatedAt = timestamp.getTime() < existing.updatedAt.getTime()
        ? new Date(existing.updatedAt.getTime())
        : new Date(timestamp.getTime());

      const updated: Post = {
        id: existing.id,
        title: draft.title,
        content: draft.content,
        category: draft.category,
        tags: [...draft.tags],
        createdAt: existing.createdAt,
        updatedAt
      };
      posts.set(id, updated);

      return clonePost(updated);
    });

  const remove = (id: number): Promise<void> =>
    lock.withWrite(() => {
      if (!posts.delete(id)) {
        throw new PostNotFoundError(id);
      }
    });

  return {
    create,
    get,
    list,
    update,
    delete: remove
  };
};

export { createMemoryPostStore };
export type { MemoryPostStoreOptions };
