import type { CommandResult, InstanceTarget, ProviderKind } from "../types";

/**
 * What the credential workflow needs from a cloud. One value is built per session and passed
 * down; implementations shell out to the provider's CLI.
 */
export interface CloudProvider {
  readonly kind: ProviderKind;
  readonly label: string;
  /** Agent status string that means the instance accepts remote commands. */
  readonly onlineStatus: string;

  listInstances(ids: string[]): Promise<InstanceTarget[]>;
  getAgentStatus(id: string): Promise<string>;
  /** Sends a PowerShell script and returns the id to poll with. */
  sendCommand(id: string, scriptLines: string[]): Promise<string>;
  /** Throws `InvocationPendingError` while the channel does not know the command yet. */
  getCommandResult(commandId: string, id: string): Promise<CommandResult>;
  /** Drops whatever the channel keeps around for a finished command. */
  releaseCommand(commandId: string, id: string): Promise<void>;
  startInstances(ids: string[]): Promise<void>;
  stopInstances(ids: string[]): Promise<void>;
}
