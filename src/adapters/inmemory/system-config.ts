import type { SystemConfigPort } from "../../ports/system-config.js";

export class InMemorySystemConfig implements SystemConfigPort {
  private readonly globalValues = new Map<string, unknown>();
  private readonly channelValues = new Map<string, Map<string, unknown>>();

  set(key: string, value: unknown, salesChannelId: string | null = null): void {
    if (salesChannelId === null) {
      this.globalValues.set(key, value);
      return;
    }
    const values = this.channelValues.get(salesChannelId) ?? new Map<string, unknown>();
    values.set(key, value);
    this.channelValues.set(salesChannelId, values);
  }

  async get(key: string, salesChannelId: string | null): Promise<unknown> {
    if (salesChannelId !== null) {
      const values = this.channelValues.get(salesChannelId);
      if (values?.has(key)) {
        return values.get(key);
      }
    }
    return this.globalValues.get(key);
  }
}
