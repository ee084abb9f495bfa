import { resetThreadCompactorRegistry } from "./registry";
import "./simple-thread-compactor";

resetThreadCompactorRegistry();

export * from "./types";
export * from "./registry";
export * from "./thread-compactor.factory";
export {
  SimpleThreadCompactor,
  SimpleThreadCompactorStrategy,
} from "./simple-thread-compactor";
