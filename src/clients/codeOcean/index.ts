export { CodeOceanClient } from "./codeOceanClient";
