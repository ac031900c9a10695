export { version } from './version'
export { doctor } from './doctor'

// Local CI
export { ciRun } from './ci/run'

// GitHub Actions workflows
export { workflowsValidate } from './workflows/validate'
export { workflowsAct } from './workflows/act'

// Repository migration
export { repoValidate } from './repo/validate'
export { repoMigrate } from './repo/migrate'

// Maintenance helpers
export { depsDependabot } from './deps/dependabot'
export { stylePep8 } from './style/pep8'
