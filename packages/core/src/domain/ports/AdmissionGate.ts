/**
 * Shared counting gate bounding in-flight requests across workers (and across
 * batch runs, when one instance is passed to several of them).
 *
 * Workers call `acquire()` before each request and `release()` after it,
 * whatever the outcome.
 */
export interface AdmissionGate {
  acquire(): Promise<void>;
  release(): void;
}
