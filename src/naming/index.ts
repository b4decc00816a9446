export { resolveName } from "./nameResolver";
export {
  explicitNameStrategy,
  dataDescriptionStrategy,
  defaultNameStrategy,
  extractDescriptorName,
} from "./strategies";
export { formatNameTimestamp, isValidTimeZone } from "./timestamp";
