import { Injectable, Logger } from '@nestjs/common';

export interface OperationalAlert {
  code: string;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * Raises alerts that need an operator. Alerts are error-level log records
 * under their own logger context so log shipping can route them.
 */
@Injectable()
export class AlertService {
  private readonly logger = new Logger('OperationalAlert');

  raise(alert: OperationalAlert): void {
    this.logger.error(
      JSON.stringify({
        code: alert.code,
        message: alert.message,
        raisedAt: new Date().toISOString(),
        ...alert.context,
      }),
    );
  }
}
