import { loadDefaultConfigFromYaml } from './config-default-loader.js'

import type { AppDefaults } from './config-default-loader.js'

export type AppConfig = AppDefaults
export type TailerConfig = AppConfig['tailer']
export type StoreConfig = AppConfig['store']
export type ListenerConfig = AppConfig['listener']

export type ConfigOverrides = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>
}

let cachedDefaults: AppDefaults | undefined

const loadDefaults = (): AppDefaults => {
  cachedDefaults ??= loadDefaultConfigFromYaml()
  return cachedDefaults
}

export const defaultConfig = (overrides: ConfigOverrides = {}): AppConfig => {
  const defaults = loadDefaults()
  return {
    tailer: { ...defaults.tailer, ...overrides.tailer },
    store: { ...defaults.store, ...overrides.store },
    listener: { ...defaults.listener, ...overrides.listener },
    log: { ...defaults.log, ...overrides.log },
  }
}
