export { defaultArgConfig, goArgConfig, withArgConfig } from "./arg-config.js";
export { prefixInverseGenerator } from "./inverse.js";
export { loadArgConfig } from "./load.js";
