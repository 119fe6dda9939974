import type { WireBreadcrumb } from '@stackwire/observability-contracts';
import { PreconditionError } from './errors';
import { formatIsoSecondPrecision } from './iso-date';
import { SeverityLevel } from './severity';

export interface BreadcrumbOptions {
  /** A dot-separated source, e.g. `ui.click` */
  category?: string;
  /** Contents depend on the breadcrumb `type` */
  data?: Record<string, string>;
  level?: SeverityLevel;
  /** `default`, `http`, `navigation`, ... */
  type?: string;
}

/**
 * A timestamped trail entry describing something that happened before an
 * event was captured. Submitted with second precision.
 */
export class Breadcrumb {
  readonly message?: string;
  readonly timestamp: Date;
  readonly category?: string;
  readonly data?: Readonly<Record<string, string>>;
  readonly level: SeverityLevel;
  readonly type?: string;

  constructor(message: string | undefined, timestamp: Date, options: BreadcrumbOptions = {}) {
    if (!(timestamp instanceof Date) || Number.isNaN(timestamp.getTime())) {
      throw new PreconditionError('Breadcrumb requires a valid timestamp');
    }
    this.message = message;
    this.timestamp = new Date(timestamp.getTime());
    this.category = options.category;
    this.data = options.data ? Object.freeze({ ...options.data }) : undefined;
    this.level = options.level ?? SeverityLevel.info;
    this.type = options.type;
    Object.freeze(this);
  }

  toJson(): WireBreadcrumb {
    const json: WireBreadcrumb = {
      timestamp: formatIsoSecondPrecision(this.timestamp),
    };
    if (this.message !== undefined) json.message = this.message;
    if (this.category !== undefined) json.category = this.category;
    if (this.data !== undefined && Object.keys(this.data).length > 0) {
      json.data = { ...this.data };
    }
    json.level = this.level;
    if (this.type !== undefined) json.type = this.type;
    return json;
  }
}
