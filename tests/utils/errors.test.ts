import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  ArchiveStateError,
  ConfigError,
  FileNotFoundError,
  FileSystemError,
  StructureError,
  TransferError,
  UserCancellationError,
  ValidationError,
  errorMessage,
  handleError,
} from '../../packages/core/src/utils/errors.js';
import { ErrorCodes, ForkferryError } from '../../packages/core/src/types/index.js';

describe('error classes', () => {
  it('carry their code and details', () => {
    const error = new FileNotFoundError('/tmp/missing');
    assert.ok(error instanceof ForkferryError);
    assert.equal(error.code, ErrorCodes.FILE_NOT_FOUND);
    assert.equal(error.message, 'File not found: /tmp/missing');
    assert.deepEqual(error.details, { path: '/tmp/missing' });
    assert.equal(error.name, 'FileNotFoundError');
  });

  it('prefix file system and validation messages', () => {
    assert.equal(new FileSystemError('disk full').message, 'File system error: disk full');
    assert.equal(new ValidationError('bad name').message, 'Validation error: bad name');
  });

  it('keep transfer and structure messages as given', () => {
    const cause = new Error('EIO');
    const error = new TransferError('write failed', { cause });
    assert.equal(error.message, 'write failed');
    assert.equal(error.code, ErrorCodes.TRANSFER_ERROR);
    assert.deepEqual(error.details, { cause });
    assert.equal(new StructureError('clash').code, ErrorCodes.STRUCTURE_ERROR);
    assert.equal(new ArchiveStateError('read-only').code, ErrorCodes.ARCHIVE_STATE_ERROR);
  });

  it('does not treat user cancellation as an engine error', () => {
    const error = new UserCancellationError();
    assert.equal(error instanceof ForkferryError, false);
    assert.equal(error.message, 'Operation cancelled by user');
  });
});

describe('handleError', () => {
  it('turns engine errors into a failed result', () => {
    assert.deepEqual(handleError(new ConfigError('Invalid value for macZip: 3')), {
      success: false,
      error: 'Invalid value for macZip: 3',
    });
  });

  it('handles plain errors and thrown values', () => {
    assert.deepEqual(handleError(new Error('plain')), { success: false, error: 'plain' });
    assert.deepEqual(handleError('text'), { success: false, error: 'An unknown error occurred' });
  });
});

describe('errorMessage', () => {
  it('reads messages from errors and stringifies anything else', () => {
    assert.equal(errorMessage(new Error('x')), 'x');
    assert.equal(errorMessage(42), '42');
  });
});
