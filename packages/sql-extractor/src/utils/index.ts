export { attempt, err, flatMap, ok, type Result } from "./result";
