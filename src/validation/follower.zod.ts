import { z } from 'zod';

export const FollowerZ = z.object({
  id: z.number().int(),
  login: z.string(),
  avatar_url: z.string(),
});

export const FollowersResponseZ = z.array(FollowerZ);
