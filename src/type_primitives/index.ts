export type { Brand } from "./brand";
export {
  is_non_negative_integer,
  unsafe_cast,
  validate_and_cast,
} from "./assertions";
export { ID_ERROR, IdError } from "./error";
