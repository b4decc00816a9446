export { buildDataAssetParams } from "./assetParamsBuilder";
