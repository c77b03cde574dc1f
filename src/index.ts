// Container
export { SlotMap } from "./slot_map/slot_map";
export {
  resolve_slot_map_options,
  type SlotMapOptions,
  type ResolvedSlotMapOptions,
} from "./slot_map/options";

// Handles
export {
  HandleLayout,
  NULL_HANDLE,
  as_slot_handle,
  is_null_handle,
  type SlotHandle,
} from "./handle/handle";

// Generation policy
export { GENERATION_POLICY } from "./key_table/key_table";

// Storage backends
export {
  ObjectItemStorage,
  TypedItemStorage,
  type ItemStorage,
} from "./item_store/item_storage";
export type { TypedArrayTag } from "./type_primitives";

// Errors
export { AppError, SlotMapError, SLOT_MAP_ERROR, is_slot_map_error } from "./utils/error";
