/**
 * Interactive `config` command
 */

import { createInterface, type Interface } from 'readline/promises';
import { Writable } from 'stream';
import type { VehicleHeight, VehicleLength } from '../types/index.js';
import type { SaveConfigInput } from '../core/config-store.js';
import type { CredentialsInput } from '../config/schema.js';

/**
 * Question/answer source for the wizard
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  askSecret(question: string): Promise<string>;
  say(line: string): void;
  close(): void;
}

const VEHICLE_HEIGHTS: VehicleHeight[] = ['under_7ft', '7ft_to_8ft', 'over_8ft'];
const VEHICLE_LENGTHS: VehicleLength[] = ['under_20ft', '20ft_to_22ft', 'over_22ft'];

/**
 * stdout passthrough that can be muted while a secret is typed
 */
class MutableOutput extends Writable {
  muted = false;

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void): void {
    if (!this.muted) {
      process.stdout.write(chunk);
    }
    callback();
  }
}

/**
 * Prompter on the process's terminal
 */
export class TerminalPrompter implements Prompter {
  private output = new MutableOutput();
  private rl: Interface = createInterface({
    input: process.stdin,
    output: this.output,
    terminal: process.stdin.isTTY === true,
  });

  async ask(question: string): Promise<string> {
    return (await this.rl.question(question)).trim();
  }

  async askSecret(question: string): Promise<string> {
    process.stdout.write(question);
    this.output.muted = true;
    try {
      return (await this.rl.question('')).trim();
    } finally {
      this.output.muted = false;
      process.stdout.write('\n');
    }
  }

  say(line: string): void {
    process.stdout.write(line + '\n');
  }

  close(): void {
    this.rl.close();
  }
}

async function askText(p: Prompter, question: string, fallback?: string): Promise<string> {
  const answer = await p.ask(fallback !== undefined ? `${question} [${fallback}]: ` : `${question}: `);
  return answer === '' && fallback !== undefined ? fallback : answer;
}

async function askNumber(p: Prompter, question: string, fallback: number): Promise<number> {
  for (;;) {
    const answer = await askText(p, question, String(fallback));
    const value = Number(answer);
    if (Number.isInteger(value) && value >= 0) return value;
    p.say(`  Please enter a whole number (got '${answer}')`);
  }
}

async function askYesNo(p: Prompter, question: string, fallback: boolean): Promise<boolean> {
  const answer = await askText(p, `${question} (y/n)`, fallback ? 'y' : 'n');
  return /^y/i.test(answer);
}

async function askChoice<T extends string>(p: Prompter, title: string, options: T[]): Promise<T> {
  p.say(title);
  options.forEach((option, index) => {
    p.say(`  ${index + 1}) ${option}${index === 0 ? ' (default)' : ''}`);
  });
  const answer = await askText(p, 'Choice', '1');
  return options[Number(answer) - 1] ?? options[0];
}

/**
 * Walk the operator through monitoring and booking settings.
 * Validation happens when the result is saved.
 */
export async function collectConfig(p: Prompter): Promise<SaveConfigInput> {
  p.say('Ferry Monitor Configuration');
  p.say('===========================');
  p.say('');
  p.say('=== Monitoring Settings ===');

  const departure = await askText(p, 'Departure terminal');
  const arrival = await askText(p, 'Arrival terminal');
  const date = await askText(p, 'Date (MM/DD/YYYY)');
  const time = await askText(p, 'Time (e.g., 1:20 pm)');
  const adults = await askNumber(p, 'Number of adults', 1);
  const children = await askNumber(p, 'Number of children', 0);
  const seniors = await askNumber(p, 'Number of seniors', 0);
  const infants = await askNumber(p, 'Number of infants', 0);
  const vehicle = await askYesNo(p, 'With vehicle?', true);
  const pollInterval = await askNumber(p, 'Poll interval (seconds)', 60);
  const timeout = await askNumber(p, 'Timeout (seconds)', 3600);
  const continuous = await askYesNo(p, 'Continuous monitoring?', false);

  p.say('');
  p.say('=== Auto-Booking Settings ===');
  const autoBook = await askYesNo(p, 'Enable auto-booking when available?', false);

  const monitor = {
    departure,
    arrival,
    date,
    time,
    adults,
    children,
    seniors,
    infants,
    vehicle,
    pollInterval,
    timeout,
    continuous,
    autoBook,
  };

  if (!autoBook) {
    return { monitor, booking: null, credentials: null };
  }

  p.say('');
  p.say('Auto-booking runs the booking command as soon as availability is detected.');
  const bookingDate = await askText(p, 'Booking date', date);

  let vehicleHeight: VehicleHeight = 'under_7ft';
  let vehicleLength: VehicleLength = 'under_20ft';
  if (vehicle) {
    vehicleHeight = await askChoice(p, 'Vehicle height:', VEHICLE_HEIGHTS);
    vehicleLength = await askChoice(p, 'Vehicle length:', VEHICLE_LENGTHS);
  }

  p.say('');
  p.say("Secrets may be typed as-is or as env:VARIABLE to read them from the worker's environment.");
  p.say('=== Account ===');
  const credentials: CredentialsInput = {
    email: await askText(p, 'Account email'),
    password: await p.askSecret('Account password: '),
  };

  p.say('');
  p.say('=== Payment Information ===');
  credentials.cardName = await askText(p, 'Cardholder name');
  credentials.cardNumber = await p.askSecret('Card number: ');
  credentials.cardExpiry = await askText(p, 'Expiry (MM/YY)');
  credentials.cardCvv = await p.askSecret('CVV: ');
  credentials.address = await askText(p, 'Billing address');
  credentials.city = await askText(p, 'City');
  credentials.province = await askText(p, 'Province', 'British Columbia');
  credentials.postalCode = await askText(p, 'Postal code');
  credentials.country = await askText(p, 'Country', 'Canada');

  p.say('');
  const dryRun = await askYesNo(p, 'DRY RUN mode (no actual payment)?', true);
  if (!dryRun) {
    p.say('');
    p.say('WARNING: dry run disabled. Starting will require a confirmation token:');
    p.say("  run 'ferry-monitor confirm-live', then 'ferry-monitor start --confirm=<token>'");
  }

  return {
    monitor,
    booking: { bookingDate, vehicleHeight, vehicleLength, dryRun },
    credentials,
  };
}
