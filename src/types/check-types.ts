/**
 * @fileoverview Environment check result types.
 *
 * @module CheckTypes
 */

export type Architecture = "arm64" | "x86_64";

export type ContainerRuntime = "docker" | "podman";

/**
 * Outcome of one dependency check. `messages` holds the diagnostic lines
 * to print, in order.
 */
export interface CheckResult<T = undefined> {
  ok: boolean;
  label: string;
  messages: string[];
  value?: T;
}

export interface ContainerRuntimeStatus {
  /** Runtime used for helper containers; docker wins when both run */
  runtime: ContainerRuntime;
  displayName: "Docker" | "Podman" | "Docker and Podman";
}

/**
 * Values resolved by a passing environment check run.
 */
export interface EnvironmentReport {
  architecture: Architecture;
  mkcertCommand: string;
  containerRuntime: ContainerRuntime;
}
