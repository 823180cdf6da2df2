#!/usr/bin/env node
'use strict';

import { createConsoleIo, InputClosedError, type ConsoleIo } from './cli/consoleIo';
import { renderChart } from './cli/chart';
import { askTimeInput, askVariableId, askYesNo, printVariables, TIME_FORMAT_HINT } from './cli/inputHelpers';
import { renderResults } from './cli/resultsView';
import { loadConfig, type AppConfig } from './logic/config';
import { calculateStats } from './logic/dataProcessing/statistics';
import { toTable } from './logic/dataProcessing/tableConverter';
import type { DataTable } from './logic/dataProcessing/types';
import { generateSampleData, DEMO_VARIABLE_ID } from './logic/demo/sampleData';
import { GridApiClient } from './logic/gridApi/apiClient';
import { describeVariable } from './logic/gridApi/variables';
import { extractErrorMessage, formatErrorLines } from './logic/utils/errorUtils';

/**
 * Anything that can fetch events for a variable and time range
 */
export interface DataFetcher {
  fetchData(variableId: string, startTime: string, endTime: string): Promise<unknown[]>;
}

export interface AppDependencies {
  io: ConsoleIo;
  config: AppConfig;
  /** Builds the API client for each fetch; throws when no key is configured */
  createFetcher?: (config: AppConfig, log: (message: string) => void) => DataFetcher;
  /** Randomness for demo data */
  random?: () => number;
}

const BANNER = '='.repeat(50);

function createDefaultFetcher(config: AppConfig, log: (message: string) => void): DataFetcher {
  return new GridApiClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    log,
  });
}

export class GridDataViewerApp {

  private readonly io: ConsoleIo;
  private readonly config: AppConfig;
  private readonly createFetcher: (config: AppConfig, log: (message: string) => void) => DataFetcher;
  private readonly random: () => number;

  constructor(deps: AppDependencies) {
    this.io = deps.io;
    this.config = deps.config;
    this.createFetcher = deps.createFetcher ?? createDefaultFetcher;
    this.random = deps.random ?? Math.random;
  }

  /**
   * Tagged diagnostic line, printed only in debug mode
   */
  log(tag: string, message: string): void {
    if (this.config.debug) {
      this.io.error(`[${tag}] ${message}`);
    }
  }

  /**
   * Print an error the way every menu action reports failures
   */
  error(error: unknown): void {
    this.io.write('');
    formatErrorLines(error).forEach((line) => this.io.write(line));
  }

  /**
   * Main menu loop; returns when the user exits or stdin ends
   */
  async run(): Promise<void> {
    this.io.write('🔌 Welcome to Fingrid Open Data Viewer!');
    this.io.write("App for retrieving and analyzing Finland's electricity data");

    try {
      for (;;) {
        const choice = await this.showMenu();
        const keepRunning = await this.handleChoice(choice);
        if (!keepRunning) {
          break;
        }
      }
    } catch (error: unknown) {
      if (!(error instanceof InputClosedError)) {
        throw error;
      }
      this.log('APP', 'Input closed, exiting');
    }
  }

  async showMenu(): Promise<string> {
    this.io.write('');
    this.io.write(BANNER);
    this.io.write('  Fingrid Open Data Viewer');
    this.io.write(BANNER);
    this.io.write('1. View electricity data');
    this.io.write('2. Show available variables');
    this.io.write('3. Demo mode (with sample data)');
    this.io.write('4. Exit');
    this.io.write(BANNER);
    return (await this.io.ask('Select option (1-4): ')).trim();
  }

  /**
   * Run one menu choice
   * @returns false when the app should exit
   */
  async handleChoice(choice: string): Promise<boolean> {
    switch (choice) {
      case '1':
        await this.fetchAndDisplayData();
        return true;
      case '2':
        printVariables(this.io);
        return true;
      case '3':
        await this.demoMode();
        return true;
      case '4':
        this.io.write('');
        this.io.write('👋 Thank you for using Fingrid Data Viewer. Goodbye!');
        return false;
      default:
        this.io.write('Invalid option. Please select 1-4.');
        return true;
    }
  }

  /**
   * Ask for a variable and time range, fetch, and display the results
   */
  async fetchAndDisplayData(): Promise<void> {
    try {
      const variableId = await askVariableId(this.io);

      this.io.write('');
      this.io.write('Enter time range for data retrieval:');
      const startTime = await askTimeInput(this.io, `Start time (${TIME_FORMAT_HINT}): `);
      const endTime = await askTimeInput(this.io, `End time (${TIME_FORMAT_HINT}): `);

      this.io.write('');
      this.io.write('⏳ Fetching data from Fingrid API...');
      this.log('GRID_API', `Requesting ${describeVariable(variableId)} from ${startTime} to ${endTime}`);
      const fetcher = this.createFetcher(this.config, (message) => this.log('GRID_API', message));
      const records = await fetcher.fetchData(variableId, startTime, endTime);

      const table = toTable(records);
      this.showResults(table, variableId);

      if (table.rows.length > 0) {
        await this.offerChart(table, variableId);
      }
    } catch (error: unknown) {
      if (error instanceof InputClosedError) {
        throw error;
      }
      this.log('GRID_API', `Fetch failed: ${extractErrorMessage(error)}`);
      this.error(error);
      this.io.write('');
      this.io.write('💡 Tip: Use Demo Mode (option 3) to see example output without an API key!');
    }
  }

  /**
   * Run the pipeline on generated hydro production data, no API needed
   */
  async demoMode(): Promise<void> {
    this.io.write('');
    this.io.write(BANNER);
    this.io.write('  DEMO MODE - Sample Electricity Data');
    this.io.write(BANNER);

    try {
      const records = generateSampleData({ random: this.random });
      this.log('DEMO', `Generated ${records.length} sample records`);

      this.io.write('');
      this.io.write(`📊 Simulating: Hydro Power Production (Variable ${DEMO_VARIABLE_ID})`);
      this.io.write('   Time Period: 2024-01-15 to 2024-01-18');

      const table = toTable(records);
      this.showResults(table, DEMO_VARIABLE_ID);
      await this.offerChart(table, DEMO_VARIABLE_ID);

      this.io.write('');
      this.io.write('✅ Demo completed successfully!');
      this.io.write('   This shows how the application processes and displays real data.');
    } catch (error: unknown) {
      if (error instanceof InputClosedError) {
        throw error;
      }
      this.error(error);
    }
  }

  private showResults(table: DataTable, variableId: string): void {
    const stats = calculateStats(table);
    renderResults(table, stats, variableId, this.config.maxRows).forEach((line) => this.io.write(line));
  }

  private async offerChart(table: DataTable, variableId: string): Promise<void> {
    this.io.write('');
    if (!(await askYesNo(this.io, 'Generate chart? (y/n): '))) {
      return;
    }
    try {
      const lines = renderChart(table, variableId);
      lines.forEach((line) => this.io.write(line));
      if (lines.length > 1) {
        this.io.write('✅ Chart displayed successfully.');
      }
    } catch (error: unknown) {
      this.error(new Error(`Failed to create chart: ${extractErrorMessage(error)}`, { cause: error }));
    }
  }
}

async function main(): Promise<void> {
  const io = createConsoleIo();
  try {
    const app = new GridDataViewerApp({ io, config: loadConfig() });
    await app.run();
  } finally {
    io.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    formatErrorLines(error).forEach((line) => console.error(line));
    process.exitCode = 1;
  });
}
