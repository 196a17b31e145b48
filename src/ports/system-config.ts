export interface SystemConfigPort {
  /**
   * Channel-scoped value, falling back to the global value; undefined when unset.
   */
  get(key: string, salesChannelId: string | null): Promise<unknown>;
}
