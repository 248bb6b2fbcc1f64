const JOBS_NS = "batches:jobs"
const JOBS_INDEX_NS = "batches:jobs:index"
const SUBMISSIONS_NS = "batches:submissions"
const RESULTS_NS = "batches:results"

export function batchJobsKeyspace(prefix: string): string {
  return `${prefix}:${JOBS_NS}`
}

export function batchJobsIndexKeyspace(prefix: string): string {
  return `${prefix}:${JOBS_INDEX_NS}`
}

export function batchSubmissionsKeyspace(prefix: string): string {
  return `${prefix}:${SUBMISSIONS_NS}`
}

export function batchResultsKeyspace(prefix: string): string {
  return `${prefix}:${RESULTS_NS}`
}

/** Directory names for the file store, one per keyspace. */
export const fileStoreDirs = {
  jobs: "jobs",
  index: "index",
  submissions: "submissions",
  results: "results",
} as const
