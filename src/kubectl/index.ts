/**
 * kubectl integration for kubefilter.
 *
 * Facade module that re-exports from specialized sub-modules:
 * - args.ts: Argument vectors for kubectl, flux and kustomize
 * - resource-kinds.ts: api-resources parsing and kind resolution
 * - containers.ts: Container names from a resource document
 */

export {
  type KubectlScope,
  DEFAULT_SCOPE,
  apiResourcesArgs,
  buildArgs,
  containersArgs,
  deleteArgs,
  editArgs,
  execArgs,
  explainArgs,
  getOneArgs,
  listArgs,
  logsArgs,
  reconcileArgs,
} from "./args.js";

export {
  type KindAliasTable,
  RECONCILABLE_KIND,
  parseResourceKinds,
  resolveKind,
} from "./resource-kinds.js";

export { parseContainerNames } from "./containers.js";
