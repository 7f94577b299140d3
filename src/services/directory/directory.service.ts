import { User } from '../../models/User';
import { LibraryError } from '../../errors/libraryError';
import { createServiceLogger } from '../../observability';
import { validateInput } from '../../validation/validateInput';
import {
  AddUserDTO,
  UpdateUserDTO,
  addUserValidation,
  updateUserValidation,
} from './directory.validation';

const log = createServiceLogger('user-directory');

const copyUser = (user: User): User => ({ ...user, borrowed: [...user.borrowed] });

/**
 * User records keyed by name, in insertion order
 */
export class UserDirectory {
  private readonly users = new Map<string, User>();

  constructor(initial: User[] = []) {
    for (const user of initial) {
      const added = this.addUser(user);
      this.require(added.name).borrowed.push(...user.borrowed);
    }
  }

  get size(): number {
    return this.users.size;
  }

  has(name: string): boolean {
    return this.users.has(name);
  }

  find(name: string): User {
    return copyUser(this.require(name));
  }

  list(): User[] {
    return Array.from(this.users.values(), copyUser);
  }

  addUser(dto: AddUserDTO): User {
    const fields = validateInput(addUserValidation, dto, 'Invalid user');
    if (this.users.has(fields.name)) {
      throw LibraryError.duplicateKey('user', fields.name);
    }

    const user: User = { name: fields.name, contact: fields.contact, borrowed: [] };
    this.users.set(user.name, user);
    log.debug({ name: user.name }, 'User added');
    return copyUser(user);
  }

  /**
   * Remove a user who holds no books
   */
  removeUser(name: string): User {
    const user = this.require(name);
    if (user.borrowed.length > 0) {
      throw LibraryError.inUse('user', name, user.borrowed.length);
    }
    this.users.delete(name);
    log.debug({ name }, 'User removed');
    return copyUser(user);
  }

  updateUser(name: string, dto: UpdateUserDTO): User {
    const user = this.require(name);
    const fields = validateInput(updateUserValidation, dto, 'Invalid user update');

    if (fields.contact !== undefined) user.contact = fields.contact;

    log.debug({ name }, 'User updated');
    return copyUser(user);
  }

  /**
   * Count copies of a title held by a user
   */
  holding(name: string, title: string): number {
    return this.require(name).borrowed.filter((held) => held === title).length;
  }

  addBorrowed(name: string, title: string): User {
    const user = this.require(name);
    user.borrowed.push(title);
    return copyUser(user);
  }

  /**
   * Drop one copy of a title from a user's borrowed list
   */
  removeBorrowed(name: string, title: string): User {
    const user = this.require(name);
    const index = user.borrowed.indexOf(title);
    if (index === -1) {
      throw LibraryError.notBorrowed(name, title);
    }
    user.borrowed.splice(index, 1);
    return copyUser(user);
  }

  private require(name: string): User {
    const user = this.users.get(name);
    if (!user) {
      throw LibraryError.notFound('user', name);
    }
    return user;
  }
}
