export { PersistenceService, PersistenceOptions } from './persistence.service';
export { LibraryDocument, libraryDocumentSchema } from './persistence.schema';
