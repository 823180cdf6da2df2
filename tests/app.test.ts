/**
 * Tests for the menu loop
 *
 * The app is driven by scripted answers; the API client is replaced by a
 * jest mock behind the DataFetcher interface.
 */

import { GridDataViewerApp, type DataFetcher } from '../app';
import type { AppConfig } from '../logic/config';
import { BASE_URL } from '../logic/gridApi/apiClient';
import { NetworkError, ValidationError } from '../logic/utils/errorUtils';
import { createScriptedIo } from './helpers/scriptedIo';

const config: AppConfig = {
  apiKey: 'test-key',
  baseUrl: BASE_URL,
  timeoutMs: 10000,
  maxRows: 20,
  debug: false,
};

const events = [
  { start_time: '2024-01-15T00:00:00Z', end_time: '2024-01-15T01:00:00Z', value: 10 },
  { start_time: '2024-01-15T01:00:00Z', end_time: '2024-01-15T02:00:00Z', value: 20 },
  { start_time: '2024-01-15T02:00:00Z', end_time: '2024-01-15T03:00:00Z', value: 30 },
];

function createFetcher(result: unknown[] | Error) {
  const fetchData = jest.fn((_variableId: string, _startTime: string, _endTime: string) =>
    (result instanceof Error ? Promise.reject(result) : Promise.resolve(result)));
  const fetcher: DataFetcher = { fetchData };
  return { fetcher, fetchData };
}

function cycle(values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

describe('GridDataViewerApp', () => {
  describe('menu', () => {
    test('exits on option 4', async () => {
      const { io, output } = createScriptedIo(['4']);
      await new GridDataViewerApp({ io, config }).run();
      expect(output[0]).toBe('🔌 Welcome to Fingrid Open Data Viewer!');
      expect(output).toContain('1. View electricity data');
      expect(output[output.length - 1]).toBe('👋 Thank you for using Fingrid Data Viewer. Goodbye!');
    });

    test('re-prompts on an invalid option', async () => {
      const { io, output, prompts } = createScriptedIo(['9', '4']);
      await new GridDataViewerApp({ io, config }).run();
      expect(output).toContain('Invalid option. Please select 1-4.');
      expect(prompts).toEqual(['Select option (1-4): ', 'Select option (1-4): ']);
    });

    test('returns when input ends', async () => {
      const { io, output } = createScriptedIo([]);
      await expect(new GridDataViewerApp({ io, config }).run()).resolves.toBeUndefined();
      expect(output).not.toContain('👋 Thank you for using Fingrid Data Viewer. Goodbye!');
    });

    test('lists variables on option 2', async () => {
      const { io, output } = createScriptedIo(['2', '4']);
      await new GridDataViewerApp({ io, config }).run();
      expect(output).toContain('  ID 124 - Production (Hydro)');
    });
  });

  describe('fetchAndDisplayData', () => {
    test('fetches the normalized range and prints table and statistics', async () => {
      const { fetcher, fetchData } = createFetcher(events);
      const { io, output } = createScriptedIo(['1', '124', '2024-01-15', '2024-01-16T00:00:00', 'n', '4']);
      await new GridDataViewerApp({ io, config, createFetcher: () => fetcher }).run();

      expect(fetchData).toHaveBeenCalledWith('124', '2024-01-15T00:00:00Z', '2024-01-16T00:00:00Z');
      expect(output).toContain('📊 Data for Variable 124:');
      expect(output.join('\n')).toContain('| 2024-01-15 02:00:00 |      30 |');
      expect(output).toContain('Count:     3');
      expect(output).toContain('Average:   20.00');
      expect(output).toContain('Std Dev:   10.00');
    });

    test('passes config and a logger to the fetcher factory', async () => {
      const { fetcher } = createFetcher(events);
      const factory = jest.fn((_config: AppConfig, _log: (message: string) => void) => fetcher);
      const { io } = createScriptedIo(['1', '124', '2024-01-15', '2024-01-16', 'n', '4']);
      await new GridDataViewerApp({ io, config, createFetcher: factory }).run();

      expect(factory).toHaveBeenCalledTimes(1);
      expect(factory.mock.calls[0][0]).toBe(config);
    });

    test('draws a chart on request', async () => {
      const { fetcher } = createFetcher(events);
      const { io, output } = createScriptedIo(['1', '200', '2024-01-15', '2024-01-16', 'y', '4']);
      await new GridDataViewerApp({ io, config, createFetcher: () => fetcher }).run();

      expect(output).toContain('Fingrid Variable 200 - Electricity Data');
      expect(output).toContain('Time: 2024-01-15 00:00:00 -> 2024-01-15 02:00:00');
      expect(output).toContain('✅ Chart displayed successfully.');
    });

    test('skips the chart prompt when no data came back', async () => {
      const { fetcher } = createFetcher([]);
      const { io, output, prompts } = createScriptedIo(['1', '124', '2024-01-15', '2024-01-16', '4']);
      await new GridDataViewerApp({ io, config, createFetcher: () => fetcher }).run();

      expect(output).toContain('No data available for the specified parameters.');
      expect(prompts).not.toContain('Generate chart? (y/n): ');
    });

    test('prints a mapped error and the demo tip, then returns to the menu', async () => {
      const { fetcher } = createFetcher(new NetworkError('Request timed out. Please try again.'));
      const { io, output } = createScriptedIo(['1', '124', '2024-01-15', '2024-01-16', '4']);
      await new GridDataViewerApp({ io, config, createFetcher: () => fetcher }).run();

      expect(output).toContain('❌ Error: Network error. Please check your internet connection.');
      expect(output).toContain('   Details: Request timed out. Please try again.');
      expect(output).toContain('💡 Tip: Use Demo Mode (option 3) to see example output without an API key!');
      expect(output[output.length - 1]).toBe('👋 Thank you for using Fingrid Data Viewer. Goodbye!');
    });

    test('maps an unknown variable to the validation message', async () => {
      const { fetcher } = createFetcher(new ValidationError('Variable ID 999 not found.'));
      const { io, output } = createScriptedIo(['1', '999', '2024-01-15', '2024-01-16', '4']);
      await new GridDataViewerApp({ io, config, createFetcher: () => fetcher }).run();

      expect(output).toContain('❌ Error: Invalid input. Please check the provided parameters.');
      expect(output).toContain('   Details: Variable ID 999 not found.');
    });

    test('reports a missing API key through the default client', async () => {
      const { io, output } = createScriptedIo(['1', '124', '2024-01-15', '2024-01-16', '4']);
      await new GridDataViewerApp({ io, config: { ...config, apiKey: undefined } }).run();

      expect(output).toContain('❌ Error: Authentication failed. Please check your API key.');
      expect(output).toContain(
        '   Details: FINGRID_API_KEY is missing. Set it as an environment variable.\n'
        + 'Example: export FINGRID_API_KEY=your_key_here',
      );
    });

    test('reports malformed data as a processing error', async () => {
      const { fetcher } = createFetcher([{ start_time: 'not a time', value: 1 }]);
      const { io, output } = createScriptedIo(['1', '124', '2024-01-15', '2024-01-16', '4']);
      await new GridDataViewerApp({ io, config, createFetcher: () => fetcher }).run();

      expect(output).toContain('❌ Error: Error processing data. Please try again.');
    });

    test('logs tagged diagnostics in debug mode', async () => {
      const { fetcher } = createFetcher(new NetworkError('HTTP Error: 500'));
      const { io, errors } = createScriptedIo(['1', '124', '2024-01-15', '2024-01-16', '4']);
      await new GridDataViewerApp({ io, config: { ...config, debug: true }, createFetcher: () => fetcher }).run();

      expect(errors).toEqual([
        '[GRID_API] Requesting Production (Hydro) from 2024-01-15T00:00:00Z to 2024-01-16T00:00:00Z',
        '[GRID_API] Fetch failed: HTTP Error: 500',
      ]);
    });

    test('stays quiet outside debug mode', async () => {
      const { fetcher } = createFetcher(new NetworkError('HTTP Error: 500'));
      const { io, errors } = createScriptedIo(['1', '124', '2024-01-15', '2024-01-16', '4']);
      await new GridDataViewerApp({ io, config, createFetcher: () => fetcher }).run();

      expect(errors).toEqual([]);
    });
  });

  describe('demoMode', () => {
    test('runs the pipeline on sample data without fetching', async () => {
      const factory = jest.fn();
      const { io, output } = createScriptedIo(['3', 'n', '4']);
      await new GridDataViewerApp({ io, config, createFetcher: factory, random: () => 0.5 }).run();

      const text = output.join('\n');
      expect(factory).not.toHaveBeenCalled();
      expect(output).toContain('  DEMO MODE - Sample Electricity Data');
      expect(output).toContain('📊 Data for Variable 124:');
      expect(text).toContain('| 2024-01-15 00:00:00 |    1225 |');
      expect(text).toContain('... (showing 20 of 72 rows)');
      expect(output).toContain('Count:     72');
      expect(output).toContain('Average:   1225.00');
      expect(output).toContain('Std Dev:   0.00');
      expect(output).toContain('✅ Demo completed successfully!');
    });

    test('honours the configured row cap', async () => {
      const { io, output } = createScriptedIo(['3', 'n', '4']);
      await new GridDataViewerApp({ io, config: { ...config, maxRows: 5 }, random: () => 0.5 }).run();
      expect(output.join('\n')).toContain('... (showing 5 of 72 rows)');
    });

    test('draws the demo chart on request', async () => {
      const { io, output } = createScriptedIo(['3', 'y', '4']);
      await new GridDataViewerApp({ io, config, random: cycle([0.1, 0.9, 0.5]) }).run();

      expect(output).toContain('Fingrid Variable 124 - Electricity Data');
      expect(output).toContain('Time: 2024-01-15 00:00:00 -> 2024-01-17 23:00:00');
      expect(output).toContain('✅ Chart displayed successfully.');
    });
  });
});
