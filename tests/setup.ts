// Set test environment before any source module reads it
process.env.NODE_ENV = 'test';
process.env.LIBRARY_AUTOLOAD = 'false';

jest.setTimeout(10000);
