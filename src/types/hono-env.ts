/** Context variables every credit API handler can read; `requestId` is set by requestIdMiddleware. */
export type AppEnv = {
  Variables: {
    requestId: string
  }
}
