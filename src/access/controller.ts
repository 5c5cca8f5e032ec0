import type { ConfigurationProvider } from "../config/appConfig";
import { describeError } from "../errors";
import type { RepositoryGateway } from "../github/types";
import { componentLogger, type Logger } from "../logger";

export interface AccessControllerOptions {
  gateway: RepositoryGateway;
  configuration: ConfigurationProvider;
  logger?: Logger;
}

export interface TeamReference {
  org: string;
  teamSlug: string;
}

/**
 * Parses `org/team`. Returns null unless there are exactly two non-empty segments.
 */
export function parseTeamReference(value: string): TeamReference | null {
  const parts = value.split("/").map((part) => part.trim());
  if (parts.length !== 2) {
    return null;
  }

  const [org, teamSlug] = parts;
  if (!org || !teamSlug) {
    return null;
  }

  return { org, teamSlug };
}

export class AccessController {
  private readonly gateway: RepositoryGateway;
  private readonly configuration: ConfigurationProvider;
  private readonly logger: Logger;

  constructor(options: AccessControllerOptions) {
    this.gateway = options.gateway;
    this.configuration = options.configuration;
    this.logger = componentLogger(options.logger, "access");
  }

  /** Never throws: every failure resolves to `false`. */
  async isUserAuthorized(userToken: string): Promise<boolean> {
    try {
      const config = await this.configuration.getConfig(false);
      const team = parseTeamReference(config.authorizedTeam);
      if (!team) {
        this.logger.error("Invalid authorized team format; expected org/team", {
          authorizedTeam: config.authorizedTeam
        });
        return false;
      }

      const member = await this.gateway.isUserInTeam(userToken, team.org, team.teamSlug);
      this.logger.info("Team membership checked", { org: team.org, team: team.teamSlug, member });
      return member;
    } catch (error) {
      this.logger.warn("Authorization check failed", { error: describeError(error) });
      return false;
    }
  }
}
