/**
 * Known notebook repositories and what each needs
 *
 * Lookup is by exact repository name. Profiles declared under
 * `[repositories.<name>]` in nbci.toml replace the built-in entry of the same name.
 */

import type { NbciConfig } from '../types/config'
import { type RepositoryProfile, type RepositoryProfileInput, RepositoryProfileSchema } from '../types/repository'

export const JDAVIZ_POST_RUN_SCRIPT = 'scripts/jdaviz_image_replacement.sh'

const BUILT_IN: Record<string, RepositoryProfileInput> = {
  jdat_notebooks: {
    label: 'JDAT Notebooks',
    ci: {
      notice: 'Setting up CRDS environment for JDAT notebooks',
      env: {
        CRDS_SERVER_URL: 'https://jwst-crds.stsci.edu',
        CRDS_PATH: '/tmp/crds_cache',
      },
      create_dirs: ['/tmp/crds_cache'],
    },
    migration: {
      python_version: '3.11',
      execution_mode: 'full',
      special: 'crds',
      note: 'CRDS cache settings are applied by the centralized actions',
    },
    readiness: {
      pattern: 'astropy|photutils|specutils',
      description: 'JDAT analysis packages',
    },
  },
  mast_notebooks: {
    label: 'MAST Notebooks',
    ci: {
      notice: 'Checking MAST API access',
      probe: { module: 'astroquery.mast', description: 'MAST API', hint: 'install astroquery' },
    },
    migration: {
      python_version: '3.11',
      execution_mode: 'full',
      special: 'mast-api',
    },
    readiness: {
      pattern: 'astroquery|mast',
      description: 'MAST queries',
    },
  },
  hst_notebooks: {
    label: 'HST Notebooks',
    ci: {
      notice: 'Checking HST calibration software',
      probe: { module: 'hstcal', description: 'hstcal', hint: 'workflows install it from the hstcal environment' },
    },
    migration: {
      python_version: '3.11',
      execution_mode: 'full',
      special: 'hstcal',
      note: 'Workflows use the hstcal conda environment',
    },
    readiness: {
      pattern: 'hstcal|drizzle|stsynphot',
      description: 'HST calibration tools',
    },
  },
  'jwst-pipeline-notebooks': {
    label: 'JWST Pipeline Notebooks',
    ci: {
      notice: 'Checking jdaviz for JWST pipeline notebooks',
      probe: { module: 'jdaviz', description: 'jdaviz' },
    },
    migration: {
      python_version: '3.11',
      execution_mode: 'full',
      special: 'jwst-pipeline',
      post_run_script: JDAVIZ_POST_RUN_SCRIPT,
      scaffold_post_run_script: true,
    },
    readiness: {
      pattern: 'jwst|jdaviz|stdatamodels',
      description: 'JWST pipeline packages',
      required_files: [JDAVIZ_POST_RUN_SCRIPT],
    },
  },
  hello_universe: {
    label: 'Hello Universe',
    migration: {
      python_version: '3.11',
      execution_mode: 'validation-only',
      special: 'educational',
      security_scan: false,
      note: 'Educational notebooks are validated only, never executed in CI',
    },
    readiness: {
      pattern: '# Introduction|Getting Started|Tutorial',
      description: 'educational content',
    },
  },
}

const builtInProfiles: Record<string, RepositoryProfile> = Object.fromEntries(
  Object.entries(BUILT_IN).map(([name, input]) => [name, RepositoryProfileSchema.parse(input)])
)

/**
 * All profiles: built-ins overlaid with the ones from nbci.toml
 */
export function listRepositoryProfiles(config?: NbciConfig): Record<string, RepositoryProfile> {
  return { ...builtInProfiles, ...(config?.repositories ?? {}) }
}

/**
 * Profile for a repository name, or undefined for repositories with no special handling
 */
export function getRepositoryProfile(name: string, config?: NbciConfig): RepositoryProfile | undefined {
  const profiles = listRepositoryProfiles(config)
  return Object.prototype.hasOwnProperty.call(profiles, name) ? profiles[name] : undefined
}
