import { STAGE_KEYWORDS } from "../core/stages.js";

export interface UsageInfo {
  models: string[];
  fragments: string[];
  program?: string;
}

export function kforgeUsage(info: UsageInfo): string {
  const program = info.program ?? "kforge";
  const fragments = info.fragments.length > 0 ? info.fragments.join(", ") : "(none found)";
  return [
    "Usage:",
    `  ${program} [options] <stage> model=<model> [name=<name>] [os_patch_level=<YYYY-MM>] [+-]<conf>...`,
    `  ${program} [options] :<stage>`,
    "",
    `<stage>: one of ${STAGE_KEYWORDS.join(", ")}`,
    "  Each stage runs all previous stages first.",
    "  Prefix ':' skips the previous stages.",
    "",
    "model=<model>        phone model, remembered for later runs",
    `  Supported models: ${info.models.join(", ")}`,
    "name=<name>          custom kernel name (LOCALVERSION)",
    "os_patch_level=<date> patch date (YYYY-MM) instead of the one in",
    "                     build.mkbootimg.<model>, e.g. os_patch_level=2020-02",
    "[+-]<conf>           enable (+) or disable (-) a configuration fragment",
    `  Available: ${fragments}`,
    "  Unlisted fragments keep the default encoded in their file name",
    "  (kernel/configs/cruel+<conf>.conf is on, cruel-<conf>.conf is off).",
    "  Use +magisk+canary for the canary Magisk payload.",
    "",
    "Configuration tokens are ignored with :build and :flash.",
    "",
    "Options:",
    "  --tree <dir>         kernel tree root (default: current directory)",
    "  --dry-run            print the resolved plan as JSON and exit",
    "  --log-level <level>  debug | info | warn | error",
    "  --no-color           disable colored output",
    "  --version            print the version",
    "  --help               show this help",
    "",
    "Examples:",
    `  ${program} config model=G973F name=mykernel +magisk -bfq`,
    `  ${program} mkimg os_patch_level=2020-02`,
    `  ${program} :flash`,
  ].join("\n");
}
