export type FetchPath = 'static' | 'browser';

export interface Scenario {
  name: string;
  target: string;
  expected_behavior_note: string;
  /** When set, the reported fetch_method is compared against it (observational only). */
  expected_fetch_method?: FetchPath;
}

export const DEFAULT_SCENARIOS: readonly Scenario[] = [
  {
    name: 'Static HTML Test',
    target: 'https://httpbin.org/html',
    expected_behavior_note: 'Should use static fetcher',
    expected_fetch_method: 'static',
  },
  {
    name: 'JavaScript SPA Test',
    target: 'https://jsonplaceholder.typicode.com/',
    expected_behavior_note: 'Should detect and use browser fetcher',
    expected_fetch_method: 'browser',
  },
];
