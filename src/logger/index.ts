export { debug, info, warn, error, setLevel, withContext } from "./logger";
