/**
 * Closed interval of instants a run covers.
 */
export interface ReportingPeriod {
  start: Date
  end: Date
}
