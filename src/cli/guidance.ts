import { ErrorCodes, isRolloutError } from '../lib/errors';

/**
 * Follow-up hints printed under a failed command
 */
export function guidanceFor(error: unknown): string[] {
  if (!isRolloutError(error)) {
    return ['Re-run with --log-level debug --dev for details'];
  }

  switch (error.code) {
    case ErrorCodes.MANIFEST_NOT_FOUND:
    case ErrorCodes.MANIFEST_PARSE_FAILED:
    case ErrorCodes.MANIFEST_INVALID:
    case ErrorCodes.DUPLICATE_RESOURCE:
      return [
        'Check the manifest paths; directories are read for *.yaml, *.yml and *.json',
        'Run: kube-rollout validate <paths...>',
      ];
    case ErrorCodes.TARGET_NOT_FOUND:
    case ErrorCodes.TARGET_AMBIGUOUS:
      return ['Name the workload with --deployment (and --service) or spec.target in the RolloutPlan'];
    case ErrorCodes.PLAN_INVALID:
      return ['Run: kube-rollout plan <paths...> to review the resolved plan'];
    case ErrorCodes.KUBERNETES_CONNECTION_FAILED:
    case ErrorCodes.KUBERNETES_APPLY_FAILED:
    case ErrorCodes.RESOURCE_NOT_FOUND:
      return [
        'Check cluster access: kubectl cluster-info',
        'Select a kubeconfig or context with --kubeconfig / --context',
      ];
    case ErrorCodes.NO_PREVIOUS_REVISION:
      return ['Run: kube-rollout history <name> to see recorded revisions'];
    case ErrorCodes.STORE_CORRUPT:
    case ErrorCodes.STORE_WRITE_FAILED:
      return ['Point --state-dir at a writable directory, or move the damaged history.json aside'];
    case ErrorCodes.CONFIG_INVALID:
      return ['Check the ROLLOUT_* and LOG_LEVEL environment variables'];
    default:
      return ['Re-run with --log-level debug --dev for details'];
  }
}
