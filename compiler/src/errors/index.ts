export { CodegenError, CodegenFault } from "./codegen-error.ts";
export type { FaultContext } from "./codegen-error.ts";
