export interface Coordinate {
    latitude: number;
    longitude: number;
    name: string;
}
