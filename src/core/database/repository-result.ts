export type RepositoryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: 'duplicate' };

export const ok = <T>(value: T): RepositoryResult<T> => ({ ok: true, value });

export const duplicate = <T>(): RepositoryResult<T> => ({
  ok: false,
  error: 'duplicate',
});
