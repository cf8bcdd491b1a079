export { declaredParameterOrder, reconcileArguments } from "./reconcile.js";
export { dispatchCommand } from "./dispatch.js";
