export * from "./types/sample.types";
export * from "./types/trial.types";
export * from "./types/artifact.types";
export * from "./utils/payload.utils";
export * from "./utils/trial.utils";
