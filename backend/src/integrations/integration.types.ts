export type IntegrationFailure = { success: false; error: string };

export type IntegrationResult<TSuccess extends object> =
  | ({ success: true } & TSuccess)
  | IntegrationFailure;

export function failure(error: string): IntegrationFailure {
  return { success: false, error };
}
