export * from "./config.js";
export * from "./session.js";
export * from "./gitlab.js";
export * from "./sonarqube.js";
