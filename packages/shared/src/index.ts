export * from "./schemas/app-config";
export * from "./schemas/bot-state";
export * from "./schemas/paper-account";
export * from "./schemas/rebalance";
export * from "./schemas/tools";
