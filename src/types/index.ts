import type { z } from 'zod';
import type { FollowerZ } from '../validation/follower.zod.ts';

export type Follower = z.infer<typeof FollowerZ>;
