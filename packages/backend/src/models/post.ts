/**
 * @description: Post entity, draft shape and wire serialization.
 * @scope: backend
 * @module: PostModel
 * @risk: medium - Field names are a fixed client contract.
 */

// --- Entity ---
export type Post = {
  id: number;
  title: string;
  content: string;
  category: string;
  tags: string[];
  createdAt: Date;
  updatedAt: Date;
};

// Caller-supplied fields for create and update; id and timestamps belong to the store.
export type PostDraft = {
  title: string;
  content: string;
  category: string;
  tags: string[];
};

// --- Wire shape ---
export type PostJson = {
  id: number;
  title: string;
  content: string;
  category: string;
  tags: string[];
  createdAt: string;
  updatedAt: string;
};

export const clonePost = (post: Post): Post => ({
  ...post,
  tags: [...post.tags],
  createdAt: new Date(post.createdAt.getTime()),
  updatedAt: new Date(post.updatedAt.getTime())
});

export const serializePost = (post: Post): PostJson => ({
  id: post.id,
  title: post.title,
  content: post.content,
  category: post.category,
  tags: [...post.tags],
  createdAt: post.createdAt.toISOString(),
  updatedAt: post.updatedAt.toISOString()
});
