export { UserDirectory } from './directory.service';
export {
  AddUserDTO,
  UpdateUserDTO,
  addUserValidation,
  updateUserValidation,
} from './directory.validation';
