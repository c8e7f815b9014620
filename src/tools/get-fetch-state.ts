import { z } from 'zod';

import { getFetchState as readFetchState } from '../db/index.js';
import { parsePostReference } from '../parsers/reference.js';

export const getFetchStateSchema = {
  post: z.string().min(1).describe('Post URL or bare numeric post ID.'),
};

export async function getFetchState(params: { post: string }) {
  const postId = parsePostReference(params.post);
  return {
    post_id: postId,
    relations: readFetchState(postId),
  };
}
