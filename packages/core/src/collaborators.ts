import { atom } from "@pumped-fn/lite"
import type { Sync } from "./types"

/** Settings store kept in memory; hosts preset `settingsStoreAtom` with a persistent one. */
export class MemorySettingsStore implements Sync.SettingsStore {
  private readonly values = new Map<string, string | boolean | number>()

  constructor(initial?: Record<string, string | boolean | number>) {
    for (const [key, value] of Object.entries(initial ?? {})) {
      this.values.set(key, value)
    }
  }

  getString(key: string): string | undefined {
    const value = this.values.get(key)
    return typeof value === "string" ? value : undefined
  }

  getBoolean(key: string): boolean | undefined {
    const value = this.values.get(key)
    return typeof value === "boolean" ? value : undefined
  }

  getNumber(key: string): number | undefined {
    const value = this.values.get(key)
    return typeof value === "number" ? value : undefined
  }

  set(key: string, value: string | boolean | number): void {
    this.values.set(key, value)
  }
}

export const settingsStoreAtom = atom({
  factory: (): Sync.SettingsStore => new MemorySettingsStore(),
})

/** Provider used when the host has no location services. */
export const unavailableLocation: Sync.LocationProvider = {
  authorizationStatus: "restricted",
  lastKnownCoordinate: () => undefined,
  requestAuthorization: () => {},
}

export const locationProviderAtom = atom({
  factory: (): Sync.LocationProvider => unavailableLocation,
})

export function isLocationAuthorized(provider: Sync.LocationProvider): boolean {
  return (
    provider.authorizationStatus === "authorizedWhenInUse" ||
    provider.authorizationStatus === "authorizedAlways"
  )
}
