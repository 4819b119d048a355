import { QueryFailedError, TypeORMError } from 'typeorm';
import { ConflictError, NotFoundError, UnavailableError } from './errors';
import { translateStorageError } from './storage-errors';

function queryFailure(code: string): QueryFailedError {
  return new QueryFailedError('INSERT INTO reviews ...', [], Object.assign(new Error(code), { code }));
}

describe('translateStorageError', () => {
  it.each(['23505', 'SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY'])(
    'maps unique violation %s to a conflict',
    (code) => {
      expect(translateStorageError(queryFailure(code))).toBeInstanceOf(ConflictError);
    },
  );

  it.each(['23503', 'SQLITE_CONSTRAINT_FOREIGNKEY'])(
    'maps foreign key violation %s to a conflict',
    (code) => {
      expect(translateStorageError(queryFailure(code))).toBeInstanceOf(ConflictError);
    },
  );

  it('maps other storage failures to unavailable and keeps the cause', () => {
    const failure = queryFailure('ECONNRESET');

    const translated = translateStorageError(failure);

    expect(translated).toBeInstanceOf(UnavailableError);
    expect(translated instanceof UnavailableError && translated.cause).toBe(failure);
    expect(translateStorageError(new TypeORMError('pool closed'))).toBeInstanceOf(UnavailableError);
  });

  it('passes core errors and unrelated errors through', () => {
    const notFound = new NotFoundError('Title 1 not found');
    const bug = new TypeError('x is undefined');

    expect(translateStorageError(notFound)).toBe(notFound);
    expect(translateStorageError(bug)).toBe(bug);
  });
});
