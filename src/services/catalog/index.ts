export { BookCatalog } from './catalog.service';
export {
  AddBookDTO,
  UpdateBookDTO,
  addBookValidation,
  updateBookValidation,
} from './catalog.validation';
