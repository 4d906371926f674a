import { Request } from 'express';
import { UserGroup } from './permissions';

/** Identity resolved by the upstream auth layer. */
export interface Caller {
  userId: number;
  group: UserGroup;
}

export interface AuthenticatedRequest extends Request {
  caller?: Caller;
}

export const USER_ID_HEADER = 'x-user-id';
export const USER_GROUP_HEADER = 'x-user-group';
