import * as fs from 'node:fs';
import * as path from 'node:path';
import { errorCode, errorMessage, UserNotFoundError } from '../errors';
import { tmpDir, removeDir } from './helpers';

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected the call to throw');
}

describe('errorCode', () => {
  let dir: string;

  beforeEach(() => {
    dir = tmpDir('errors-test-');
  });

  afterEach(() => {
    removeDir(dir);
  });

  it('reads the code of an error raised by fs', () => {
    const err = thrownBy(() => fs.readFileSync(path.join(dir, 'missing.key')));
    expect(errorCode(err)).toBe('ENOENT');
  });

  it('reads the code of plain objects and storage errors', () => {
    expect(errorCode({ code: 'SQLITE_BUSY' })).toBe('SQLITE_BUSY');
    expect(errorCode(new UserNotFoundError('mario'))).toBe('USER_NOT_FOUND');
  });

  it('returns undefined when there is no string code', () => {
    expect(errorCode(new Error('plain'))).toBeUndefined();
    expect(errorCode({ code: 42 })).toBeUndefined();
    expect(errorCode('ENOENT')).toBeUndefined();
    expect(errorCode(null)).toBeUndefined();
  });
});

describe('errorMessage', () => {
  it('reads the message of an error raised by fs', () => {
    const missing = path.join(tmpDir('errors-msg-'), 'missing.key');
    const err = thrownBy(() => fs.readFileSync(missing));

    expect(errorMessage(err)).toBe(`ENOENT: no such file or directory, open '${missing}'`);
    removeDir(path.dirname(missing));
  });

  it('stringifies values without a message', () => {
    expect(errorMessage('boom')).toBe('boom');
    expect(errorMessage(7)).toBe('7');
  });
});
