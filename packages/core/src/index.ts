export * from "./types/timing";
export * from "./types/transcript";
export * from "./errors";
export * from "./logger";

export * from "./utils/ids";
export * from "./utils/timing";
export * from "./utils/words";
export * from "./utils/diff-words";
export * from "./utils/diarization";
export * from "./utils/metadata";

export * from "./adapters/base-adapter";
export * from "./adapters/base-chunks";
export * from "./adapters/aligned-adapter";
export * from "./policy/engine-selection";

export * from "./sync/types";
export * from "./sync/approximate";
export * from "./sync/synchronizer";

export * from "./edit/update-words";
export * from "./edit/text-edit";
export * from "./edit/glossary";
export * from "./edit/redact";
export * from "./edit/polish";

export * from "./karaoke/karaoke";

export * from "./render/wrap";
export * from "./render/options";
export * from "./render/subtitles";
export * from "./render/ass";
export * from "./render/text";
export * from "./render/render";

export * from "./validate/validate-transcript";
