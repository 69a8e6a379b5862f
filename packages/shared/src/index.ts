export * from "./types/computerAction.types";
export * from "./types/messageContent.types";
export * from "./types/actionOutcome.types";
export * from "./types/search.types";
export * from "./utils/computerAction.utils";
export * from "./utils/messageContent.utils";
