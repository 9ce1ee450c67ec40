import { randomUUID } from 'crypto';

export interface AlexaSettings {
  /** Regional API host, e.g. `na-api-alexa.amazon.ca` */
  host: string;
  cookie: string;
  csrf: string;
  /** Value of the `x-amzn-alexa-app` header captured from the mobile app */
  appHeader: string;
  /** Skill id prefix used by the appliance delete endpoint */
  deleteSkill: string;
  userAgent: string;
  routineVersion: string;
}

export const SMART_HOME_SKILL_ID = 'amzn1.ask.1p.smarthome';

/**
 * URLs and headers of the (undocumented) Alexa app API
 */
export class AlexaEndpoints {
  private readonly baseUrl: string;

  constructor(private readonly settings: AlexaSettings) {
    this.baseUrl = `https://${settings.host}`;
  }

  entitiesUrl(): string {
    return `${this.baseUrl}/api/behaviors/entities?skillId=${SMART_HOME_SKILL_ID}`;
  }

  graphqlUrl(): string {
    return `${this.baseUrl}/nexus/v1/graphql`;
  }

  groupsUrl(): string {
    return `${this.baseUrl}/api/phoenix/group`;
  }

  groupUrl(groupId: string): string {
    return `${this.groupsUrl()}/${groupId}`;
  }

  applianceDeleteUrl(deleteId: string): string {
    return `${this.baseUrl}/api/phoenix/appliance/${this.settings.deleteSkill}%3D%3D_${deleteId}`;
  }

  deviceControlUrl(entityId: string): string {
    return `${this.baseUrl}/api/smarthome/v1/presentation/devices/control/${entityId}`;
  }

  /**
   * Fresh headers for one request (each carries its own request id)
   */
  headers(): Record<string, string> {
    return {
      Accept: 'application/json; charset=utf-8',
      'Content-Type': 'application/json; charset=utf-8',
      'User-Agent': this.settings.userAgent,
      'Routines-Version': this.settings.routineVersion,
      'x-amzn-alexa-app': this.settings.appHeader,
      'x-amzn-RequestId': randomUUID(),
      csrf: this.settings.csrf,
      Cookie: this.settings.cookie,
    };
  }
}
