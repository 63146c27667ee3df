/**
 * @description: Storage contract the post handlers depend on.
 * @scope: interface
 * @module: PostStore
 * @risk: medium - Every backend must honor the same not-found and id rules.
 */
import type { Post, PostDraft } from '../models/post';

/**
 * Backends reject with `PostNotFoundError` for a missing id and with
 * `PostStoreError` for anything unexpected. Returned posts are copies.
 */
export interface PostStore {
  create(draft: PostDraft): Promise<number>;
  get(id: number): Promise<Post>;
  list(term: string): Promise<Post[]>;
  update(id: number, draft: PostDraft): Promise<Post>;
  delete(id: number): Promise<void>;
}
