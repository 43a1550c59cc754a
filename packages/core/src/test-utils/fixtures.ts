import { readFileSync } from 'node:fs';

const FIXTURE_DIR = new URL('../../test/fixtures/', import.meta.url);

export type FixtureName =
  | 'sysbench-cpu'
  | 'sysbench-memory'
  | 'sysbench-fileio'
  | 'sysbench-version'
  | 'iperf3-client'
  | 'iperf3-version'
  | 'neofetch';

/** Captured tool output stored under packages/core/test/fixtures */
export function readFixture(name: FixtureName): string {
  return readFileSync(new URL(`${name}.txt`, FIXTURE_DIR), 'utf8');
}
