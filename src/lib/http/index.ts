/**
 * HTTP Module
 *
 * Single GET request with a deadline and redirects disabled.
 */

export {
  HttpProbe,
  createHttpProbe,
  describeError,
  type FetchLike,
  type ProbeOptions,
  type ProbeResponse,
  type ProbeResult,
  type BodyResult,
} from './probe.js';
