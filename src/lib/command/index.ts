export { withErrorHandler } from "./with-error-handler.js";
export {
  withR2Context,
  resolveBucket,
  requireOption,
  type R2Context,
} from "./context.js";
