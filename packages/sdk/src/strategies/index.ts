export * as consecutiveDecline from "./consecutive_decline.js";
