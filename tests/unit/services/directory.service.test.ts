/**
 * Unit tests for the User Directory
 */

import { UserDirectory } from '../../../src/services/directory/directory.service';
import { ErrorCode } from '../../../src/types/errors';
import { captureError } from '../../helpers/errors';

describe('UserDirectory', () => {
  let directory: UserDirectory;

  beforeEach(() => {
    directory = new UserDirectory([{ name: 'John Smith', contact: 'john@example.com', borrowed: [] }]);
  });

  describe('constructor', () => {
    it('should keep borrowed titles of seeded users', () => {
      const seeded = new UserDirectory([{ name: 'Ada Lane', contact: '', borrowed: ['1984', '1984'] }]);

      expect(seeded.find('Ada Lane').borrowed).toEqual(['1984', '1984']);
    });
  });

  describe('addUser', () => {
    it('should add a user with nothing borrowed', () => {
      const user = directory.addUser({ name: 'Ada Lane', contact: '555-0100' });

      expect(user).toEqual({ name: 'Ada Lane', contact: '555-0100', borrowed: [] });
      expect(directory.size).toBe(2);
    });

    it('should reject a duplicate name with DUPLICATE_KEY', () => {
      expect(captureError(() => directory.addUser({ name: 'John Smith', contact: 'x' }))).toMatchObject({
        errorCode: ErrorCode.DUPLICATE_KEY,
        message: 'User already exists: John Smith',
      });
    });

    it('should reject a blank name with INVALID_INPUT', () => {
      expect(captureError(() => directory.addUser({ name: ' ', contact: 'x' }))).toMatchObject({
        errorCode: ErrorCode.INVALID_INPUT,
        validationErrors: { name: ['Name is required'] },
      });
    });
  });

  describe('borrowed list', () => {
    it('should allow several copies of the same title', () => {
      directory.addBorrowed('John Smith', '1984');
      directory.addBorrowed('John Smith', '1984');

      expect(directory.holding('John Smith', '1984')).toBe(2);
    });

    it('should remove one copy at a time', () => {
      directory.addBorrowed('John Smith', '1984');
      directory.addBorrowed('John Smith', 'Dune');
      directory.addBorrowed('John Smith', '1984');

      expect(directory.removeBorrowed('John Smith', '1984').borrowed).toEqual(['Dune', '1984']);
    });

    it('should throw NOT_BORROWED when the title is not held', () => {
      expect(captureError(() => directory.removeBorrowed('John Smith', 'Dune'))).toMatchObject({
        errorCode: ErrorCode.NOT_BORROWED,
      });
    });

    it('should not expose the internal borrowed array', () => {
      directory.find('John Smith').borrowed.push('Dune');

      expect(directory.find('John Smith').borrowed).toEqual([]);
    });
  });

  describe('removeUser', () => {
    it('should remove a user with no loans', () => {
      directory.removeUser('John Smith');

      expect(directory.has('John Smith')).toBe(false);
      expect(captureError(() => directory.find('John Smith'))).toMatchObject({
        errorCode: ErrorCode.NOT_FOUND,
      });
    });

    it('should refuse while the user holds books', () => {
      directory.addBorrowed('John Smith', '1984');

      expect(captureError(() => directory.removeUser('John Smith'))).toMatchObject({
        errorCode: ErrorCode.IN_USE,
        message: 'User John Smith still holds 1 book',
      });
      expect(directory.has('John Smith')).toBe(true);
    });

    it('should throw NOT_FOUND for an unknown user', () => {
      expect(captureError(() => directory.removeUser('Nobody'))).toMatchObject({
        errorCode: ErrorCode.NOT_FOUND,
      });
    });
  });

  describe('updateUser', () => {
    it('should update the contact', () => {
      expect(directory.updateUser('John Smith', { contact: '555-0199' })).toEqual({
        name: 'John Smith',
        contact: '555-0199',
        borrowed: [],
      });
    });

    it('should leave the record alone when no fields are given', () => {
      expect(directory.updateUser('John Smith', {}).contact).toBe('john@example.com');
    });
  });
});
