export interface EtaEstimate {
  readonly visitId: string;
  readonly distanceMeters: number;
  readonly etaSeconds: number;
  readonly at: Date;
}
