export { listAssets, listRoots, showDiff, showStatus } from "./inspect.js";
export { installAssets, uninstallAssets, updateAssets } from "./operations.js";
