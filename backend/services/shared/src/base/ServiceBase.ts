/**
 * Purpose:
 * - Root for runtime classes (viewsets, repos, ...).
 * - Provides a consistent bound logger carrying service + component.
 *
 * Notes:
 * - service defaults from SVC_NAME to keep logs coherent per service.
 */

import { getLogger, type IBoundLogger } from "../logger/Logger";

type Dict = Record<string, unknown>;

export abstract class ServiceBase {
  protected readonly service: string;
  protected readonly log: IBoundLogger;

  constructor(opts?: { service?: string; context?: Dict; log?: IBoundLogger }) {
    this.service = (opts?.service || process.env.SVC_NAME || "unknown").trim() || "unknown";
    this.log = (opts?.log ?? getLogger()).bind({
      service: this.service,
      component: this.constructor.name,
      ...(opts?.context || {}),
    });
  }
}
