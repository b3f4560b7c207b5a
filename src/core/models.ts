/** Supported devices and the defconfig each build starts from */
export const BUILTIN_MODELS = {
  G970F: "exynos9820-beyond0lte_defconfig",
  G973F: "exynos9820-beyond1lte_defconfig",
  G975F: "exynos9820-beyond2lte_defconfig",
  G977B: "exynos9820-beyondx_defconfig",
  N970F: "exynos9820-d1_defconfig",
  N975F: "exynos9820-d2s_defconfig",
  N976B: "exynos9820-d2x_defconfig",
} as const satisfies Record<string, string>;

export interface DeviceModel {
  id: string;
  defconfig: string;
}

/**
 * Read-only model table. Entries from config may add models or point a
 * built-in model at another defconfig; built-ins cannot be removed.
 */
export class ModelRegistry {
  private readonly models = new Map<string, DeviceModel>();

  constructor(extra: Record<string, string> = {}) {
    for (const [id, defconfig] of Object.entries({ ...BUILTIN_MODELS, ...extra })) {
      this.models.set(id, { id, defconfig });
    }
  }

  has(id: string): boolean {
    return this.models.has(id);
  }

  get(id: string): DeviceModel | undefined {
    return this.models.get(id);
  }

  /** Model ids, built-ins first in table order */
  ids(): string[] {
    return [...this.models.keys()];
  }
}
