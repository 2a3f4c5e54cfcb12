import { budgetCommand } from './budget.js';
import { investCommand } from './invest.js';
import { learnCommand } from './learn.js';
import { schemesCommand } from './schemes.js';
import { upiCommand } from './upi.js';
import type { Command } from '../types.js';

export const commands: readonly Command[] = [
  learnCommand,
  budgetCommand,
  schemesCommand,
  upiCommand,
  investCommand,
];
