export const TRACKED_CITIES = [
  "New York, USA",
  "London, UK",
  "Tokyo, Japan",
  "Sydney, Australia",
  "Paris, France",
  "Mumbai, India",
  "Dubai, UAE",
  "Singapore",
  "San Francisco, USA",
  "Toronto, Canada",
] as const;
