/**
 * jarkit Engine — Dependency Resolver
 *
 * Makes sure the system packages the application needs are present.
 *
 * Planning is unprivileged: it only probes PATH and the package database,
 * so the manager can decide up front whether the install needs root.
 * Resolving installs what is missing. Required packages go through the
 * package manager under PrivilegedOps; the optional accelerated
 * downloader comes from an AUR helper run as the invoking user.
 */

import type {
  CommandRunner,
  Confirm,
  DependencyPlan,
  DependencyResolution,
  DependencyResolver,
  DependencySpec,
  LifecycleConfig,
  OperationWarning,
  PrivilegedOps,
} from "./types";
import type { Logger } from "./utils/logger";

export class PackageDependencyResolver implements DependencyResolver {
  constructor(
    private readonly config: LifecycleConfig,
    private readonly runner: CommandRunner,
    private readonly privileged: PrivilegedOps,
    private readonly confirm: Confirm,
    private readonly logger: Logger,
  ) {}

  /**
   * A dependency with a command counts as present when the command is on
   * PATH; otherwise the package database is queried.
   */
  async isPresent(dep: DependencySpec): Promise<boolean> {
    if (dep.command) {
      return this.runner.exists(dep.command);
    }
    const pm = this.config.package_manager;
    const result = await this.runner.run(pm.command, [
      ...pm.query_args,
      dep.package,
    ]);
    return result.exit_code === 0;
  }

  async plan(): Promise<DependencyPlan> {
    const plan: DependencyPlan = { missing_required: [], missing_optional: [] };
    for (const dep of this.config.dependencies) {
      const present = await this.isPresent(dep);
      this.logger.debug({ package: dep.package, present }, "Checked dependency");
      if (present) continue;
      if (dep.optional) {
        plan.missing_optional.push(dep);
      } else {
        plan.missing_required.push(dep);
      }
    }
    return plan;
  }

  async resolve(plan: DependencyPlan): Promise<DependencyResolution> {
    const warnings: OperationWarning[] = [];
    const pm = this.config.package_manager;

    for (const dep of plan.missing_required) {
      this.logger.info({ package: dep.package }, "Installing required package");
      const result = await this.privileged.run(pm.command, [
        ...pm.install_args,
        dep.package,
      ]);
      if (result.exit_code !== 0) {
        this.logger.error(
          { package: dep.package, exit_code: result.exit_code },
          "Package installation failed",
        );
        return {
          status: "failed",
          message: `Installing ${dep.package} with ${pm.command} failed (exit ${result.exit_code}).`,
          hint: `Check your network connection and ${pm.command} configuration, or install ${dep.package} manually.`,
        };
      }
    }

    for (const dep of plan.missing_optional) {
      const outcome = await this.installOptional(dep);
      if (outcome === "declined") {
        return { status: "declined" };
      }
      warnings.push(...outcome);
    }

    // Re-check required commands; a package can install without
    // putting the expected binary on PATH.
    const stillMissing: string[] = [];
    for (const dep of this.config.dependencies) {
      if (dep.optional || !dep.command) continue;
      if (!(await this.runner.exists(dep.command))) {
        stillMissing.push(dep.command);
      }
    }
    if (stillMissing.length > 0) {
      return {
        status: "failed",
        message: `Required commands are still missing: ${stillMissing.join(", ")}.`,
        hint: "Resolve the missing dependencies by hand and run install again.",
      };
    }

    const accelerated = await this.runner.exists(
      this.config.accelerated_downloader,
    );
    if (!accelerated) {
      warnings.push({
        kind: "DEPENDENCY",
        message: `${this.config.accelerated_downloader} is unavailable; downloading with ${this.config.fallback_downloader} (may be slower).`,
      });
    }

    return {
      status: "ready",
      use_fallback_downloader: !accelerated,
      warnings,
    };
  }

  private async installOptional(
    dep: DependencySpec,
  ): Promise<OperationWarning[] | "declined"> {
    for (const helper of this.config.aur_helpers) {
      if (!(await this.runner.exists(helper))) continue;
      this.logger.info({ package: dep.package, helper }, "Installing optional package");
      // AUR helpers refuse to run as root and call sudo themselves
      const result = await this.runner.run(
        helper,
        ["-S", "--noconfirm", dep.package],
        { interactive: true },
      );
      if (result.exit_code !== 0) {
        return [
          {
            kind: "DEPENDENCY",
            message: `${helper} could not install ${dep.package} (exit ${result.exit_code}).`,
          },
        ];
      }
      return [];
    }

    const warning: OperationWarning = {
      kind: "DEPENDENCY",
      message:
        `Neither ${this.config.aur_helpers.join(" nor ")} is available; install ${dep.package} from the AUR by hand ` +
        `(git clone https://aur.archlinux.org/${dep.package}.git && cd ${dep.package} && makepkg -si).`,
    };
    const proceed = await this.confirm(
      `${dep.package} is not installed and no AUR helper was found. Continue without it? Downloads will be slower.`,
      true,
    );
    if (!proceed) {
      this.logger.info({ package: dep.package }, "Operator declined to continue");
      return "declined";
    }
    return [warning];
  }
}
