/**
 * Data asset naming constants
 */

export const DEFAULT_PROCESS_NAME_SUFFIX = "processed";

export const DEFAULT_PROCESS_NAME_SUFFIX_TZ = "UTC";

/**
 * Result file that may carry the canonical name of the captured asset
 */
export const DEFAULT_DATA_DESCRIPTION_FILENAME = "data_description.json";

/**
 * Derived asset naming convention:
 * "{input name}_{YYYY-MM-DD}_{HH-MM-SS}_{process name}_{YYYY-MM-DD}_{HH-MM-SS}"
 */
export const DERIVED_NAME_REGEX =
  "^(?<input>.+?_\\d{4}-\\d{2}-\\d{2}_\\d{2}-\\d{2}-\\d{2})_(?<process>.+?)_(?<date>\\d{4}-\\d{2}-\\d{2})_(?<time>\\d{2}-\\d{2}-\\d{2})$";
