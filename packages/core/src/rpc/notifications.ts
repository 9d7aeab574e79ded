/**
 * JSON-RPC notification name constants.
 */
export const RPC_NOTIFICATION = {
  initialized: 'notifications/initialized',
  cancelled: 'notifications/cancelled'
} as const;

export type RpcNotificationValue = (typeof RPC_NOTIFICATION)[keyof typeof RPC_NOTIFICATION];
