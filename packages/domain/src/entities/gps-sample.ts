export interface GeoPoint {
  readonly lat: number;
  readonly lng: number;
}

export interface GpsSample extends GeoPoint {
  readonly driverId: number;
  readonly ts: Date;
}

export interface DriverRoute {
  readonly driverId: number;
  readonly dayStart: Date;
  readonly samples: readonly GpsSample[];
}
