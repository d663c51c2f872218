export type { Brand } from "./brand";
export {
  is_non_negative_integer,
  is_safe_non_negative_integer,
  validate_and_cast,
  unsafe_cast,
} from "./assertions";
export { TypeError, TYPE_ERROR } from "./error";
export {
  GrowableTypedArray,
  GrowableFloat64Array,
  GrowableUint32Array,
  type AnyTypedArray,
} from "./typed_arrays/typed_arrays";
