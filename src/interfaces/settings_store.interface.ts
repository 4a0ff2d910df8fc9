/** Host key/value configuration; every value is a string. */
export interface ISettingsStore {
  get(key: string, defaultValue?: string): Promise<string>;
  set(key: string, value: string): Promise<void>;
}
