export const APP_CONFIG = Symbol("APP_CONFIG");
export const INFERENCE_GATEWAY = Symbol("INFERENCE_GATEWAY");
