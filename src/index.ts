// Container
export { LeaseMap, type LeaseMapOptions } from "./lease_map";

// Keys
export {
  type LeaseKey,
  as_lease_key,
  get_key_index,
  get_key_generation,
  keys_equal,
  compare_keys,
} from "./key";

// Slots
export {
  SLOT,
  is_occupied_slot,
  type Slot,
  type OccupiedSlot,
  type VacantSlot,
} from "./slot/slot";

// Errors
export {
  AppError,
  LeaseError,
  LEASE_ERROR,
  is_lease_error,
} from "./utils/error";

// Limits
export {
  END_OF_FREE_LIST,
  RETIRED_LINK,
  MAX_CAPACITY,
  MAX_GENERATION,
  MAX_INDEX,
} from "./utils/constants";
