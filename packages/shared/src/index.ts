export { HttpClient, HttpError } from "./http.ts";
export { readConfig, writeConfig } from "./config.ts";
export { error } from "./output.ts";
