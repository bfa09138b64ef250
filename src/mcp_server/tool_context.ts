import type { ProviderCredentials } from '../services/calendar';
import type { UserTasks } from '../services/task_service';

/**
 * What a tool handler gets besides its parameters.
 *
 * `tasks` is already bound to the authenticated user. `providerCredentials` decrypts the
 * caller's upstream tokens on demand and is only called by tools that talk to the provider.
 */
export type ToolContext = {
  tasks: UserTasks;
  providerCredentials: () => Promise<ProviderCredentials>;
};
