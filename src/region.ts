import type { Region, RegionBounds } from "./types";

export const createRegion = (point: number, mark: number): Region => {
  return Object.freeze({ point, mark });
};

export const isDegenerate = (region: Region): boolean => {
  return region.point === region.mark;
};

export const regionsEqual = (a: Region, b: Region): boolean => {
  return (
    (a.point === b.point && a.mark === b.mark) ||
    (a.point === b.mark && a.mark === b.point)
  );
};

export const regionBounds = (region: Region): RegionBounds => {
  return {
    start: Math.min(region.point, region.mark),
    end: Math.max(region.point, region.mark),
  };
};
