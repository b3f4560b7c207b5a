import { z } from "zod";

export const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  color: z.boolean().default(true),
});

/** Where things live inside the kernel tree, all relative to its root */
export const TreeLayoutSchema = z.object({
  fragment_dir: z.string().min(1).default("kernel/configs"),
  fragment_prefix: z.string().min(1).default("cruel"),
  defconfig_dir: z.string().min(1).default("arch/arm64/configs"),
  merge_script: z.string().min(1).default("scripts/kconfig/merge_config.sh"),
  config_script: z.string().min(1).default("scripts/config"),
  kernel_image: z.string().min(1).default("arch/arm64/boot/Image"),
  // Pointer symlink name; per-model metadata lives at `<prefix>.<model>`
  mkbootimg_prefix: z.string().min(1).default("build.mkbootimg"),
  build_record: z.string().min(1).default("build.info"),
  boot_image: z.string().min(1).default("boot.img"),
});

export const MagiskSchema = z.object({
  update_script: z.string().min(1).default("usr/magisk/update_magisk.sh"),
  version_file: z.string().min(1).default("usr/magisk/magisk_version"),
});

export const KernelSchema = z.object({
  default_name: z.string().min(1).default("CRUEL"),
});

export const BuildSchema = z.object({
  /** make -j value; defaults to the host's available parallelism */
  jobs: z.number().int().positive().optional(),
});

export const PackagingSchema = z.object({
  vbmeta: z.boolean().default(false),
  vbmeta_image: z.string().min(1).default("vbmeta.img"),
  /** Odin bundle AP.tar.md5 (implies vbmeta) */
  ap_tar: z.boolean().default(false),
  ap_tar_name: z.string().min(1).default("AP.tar"),
});

export const FlashSchema = z.object({
  poll_interval_ms: z.number().int().nonnegative().default(1000),
});

export const ConfigSchema = z.object({
  version: z.string().default("1.0"),
  logging: LoggingSchema.default({}),
  /** Extra environment defaults, applied only when the caller has not set them */
  environment: z.record(z.string(), z.string()).default({}),
  /** Extra or overridden device models: id -> defconfig file name */
  models: z.record(z.string().regex(/^[A-Za-z0-9_]+$/), z.string().min(1)).default({}),
  tree: TreeLayoutSchema.default({}),
  magisk: MagiskSchema.default({}),
  kernel: KernelSchema.default({}),
  build: BuildSchema.default({}),
  packaging: PackagingSchema.default({}),
  flash: FlashSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type TreeLayout = z.infer<typeof TreeLayoutSchema>;
export type MagiskConfig = z.infer<typeof MagiskSchema>;
