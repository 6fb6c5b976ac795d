/**
 * Interfaces for the launch policy and the filesystem guard
 */

import { SecurityDecision } from "../types";

export interface ISecurityPolicy {
  /**
   * Decide whether a process launch may proceed
   * @param executable Executable path or bare name
   * @param args Raw argument string
   */
  evaluate(executable: string, args?: string): SecurityDecision;
}

export interface IPathGuard {
  /**
   * Deny writes that target a protected system location
   */
  checkWrite(targetPath: string): SecurityDecision;

  /**
   * Deny reads of files over the size ceiling. Missing files are allowed
   * through so the read itself reports them.
   */
  checkRead(targetPath: string): Promise<SecurityDecision>;

  /**
   * Deny content over the size ceiling
   * @param bytes Size of the content in bytes
   */
  checkContentSize(bytes: number): SecurityDecision;
}
