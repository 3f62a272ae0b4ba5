import { RegionController, type RegionOptions } from './region-controller.js';

export interface WithRegionOptions extends RegionOptions {
  height: number;
}

/**
 * Create a region, run body inside it, and restore the terminal afterwards.
 *
 * @example
 * await withRegion(2, async (bar) => {
 *   bar.printBarLine(0, 'Status: running');
 *   bar.printLine('step 1 done');
 * });
 */
export async function withRegion<T>(
  heightOrOptions: number | WithRegionOptions,
  body: (region: RegionController) => T | Promise<T>
): Promise<T> {
  const options: WithRegionOptions =
    typeof heightOrOptions === 'number' ? { height: heightOrOptions } : heightOrOptions;

  const region = new RegionController(options.height, options);
  return region.scope(body);
}
