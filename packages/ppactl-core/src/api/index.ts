// Facade API for @ppactl/core

export {
  createContext,
  type PpaContext,
  type CreateContextOptions,
} from "./context";

export {
  install,
  branchRepository,
  type InstallOptions,
  type InstallResult,
} from "./install";

export {
  remove,
  type RemoveOptions,
  type RemoveResult,
} from "./remove";

export { list } from "./list";

export {
  update,
  type UpdateResult,
} from "./update";
