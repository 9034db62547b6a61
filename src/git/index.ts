export {
  currentBranch,
  runGit,
  GitError,
  BRANCH_ENV_VAR,
  type GitRunner,
  type CurrentBranchOptions,
} from "./branch.js";
