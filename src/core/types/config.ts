export interface Config {
  devFolder: string;
  ide: string;
}

export type ConfigKey = keyof Config;
