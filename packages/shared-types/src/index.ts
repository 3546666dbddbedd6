export type * from "./predictions-api";
