export {
  DependencyHealthTracker,
  systemClock,
  DEFAULT_REVALIDATION_WINDOW_MS,
  type Clock,
  type DependencyHealthTrackerOptions,
  type DependencySnapshot
} from './tracker.js';
export { probeDependency, probeAll, HEALTH_PATHS, type ProbeTarget, type ProbeDeps } from './probe.js';
