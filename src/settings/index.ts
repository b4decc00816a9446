export { loadSettingsFromEnv } from "./loader";
export { parseSettings } from "@/utils";
