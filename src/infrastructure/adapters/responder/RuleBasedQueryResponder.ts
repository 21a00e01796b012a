import dayjs from 'dayjs';
import { FinancialRecord } from '../../../domain/entities/FinancialRecord.js';
import { formatRupees, formatScore } from '../../../domain/services/CurrencyFormatter.js';
import { calculateNetWorth } from '../../../domain/services/NetWorthCalculator.js';
import {
  QueryClassification,
  QueryResponderPort,
  QueryTopic,
} from '../../../application/ports/QueryResponderPort.js';

interface TopicRule {
  topic: QueryTopic;
  triggers: readonly string[];
  reply: (record: FinancialRecord) => string;
}

export const EMPTY_MESSAGE_REPLY = "I didn't get that. Please send a message.";

const SERVER_TIME_FORMAT = 'YYYY-MM-DD HH:mm:ss';

// Order is priority: the first rule with a matching trigger answers.
const rules: readonly TopicRule[] = [
  {
    topic: 'BANK_BALANCE',
    triggers: ['balance', 'bank', 'savings'],
    reply: ({ bankBalance }) =>
      bankBalance === undefined
        ? "I don't have your bank balance information."
        : `Your bank balance is ${formatRupees(bankBalance)}.`,
  },
  {
    topic: 'MUTUAL_FUNDS',
    triggers: ['mutual', 'mf', 'fund'],
    reply: ({ mutualFunds }) =>
      mutualFunds === undefined
        ? "I don't have mutual funds information for you."
        : `Your mutual funds are worth ${formatRupees(mutualFunds)}.`,
  },
  {
    topic: 'STOCKS',
    triggers: ['stock', 'equity', 'shares'],
    reply: ({ stocks }) =>
      stocks === undefined
        ? "I don't have stock holdings information for you."
        : `Your stock holdings are worth ${formatRupees(stocks)}.`,
  },
  {
    topic: 'LOAN',
    triggers: ['loan', 'debt', 'liability', 'liabilities'],
    reply: ({ loan }) => {
      if (loan === undefined) {
        return "I don't have loan / liability details for you.";
      }
      if (loan === 0) {
        return 'You have no active loans or liabilities.';
      }
      return `Your current loan is ${formatRupees(loan)}.`;
    },
  },
  {
    topic: 'CREDIT_SCORE',
    triggers: ['credit', 'cibil', 'score'],
    reply: ({ creditScore }) =>
      creditScore === undefined
        ? 'Your credit score is not available.'
        : `Your credit score is ${formatScore(creditScore)}.`,
  },
  {
    topic: 'NET_WORTH',
    triggers: ['net worth', 'total worth', 'networth', 'worth'],
    reply: (record) => {
      const { netWorth } = calculateNetWorth(record);
      return netWorth < 0
        ? `Your liabilities exceed your assets by ${formatRupees(Math.abs(netWorth))}.`
        : `Your total net worth is ${formatRupees(netWorth)}.`;
    },
  },
];

export class RuleBasedQueryResponder implements QueryResponderPort {
  classify(message: string): QueryClassification {
    if (!message.trim()) {
      return 'EMPTY';
    }

    return this.findRule(message)?.topic ?? 'UNKNOWN';
  }

  respond(message: string, record: FinancialRecord, now: Date): string {
    if (!message.trim()) {
      return EMPTY_MESSAGE_REPLY;
    }

    const rule = this.findRule(message);
    if (rule) {
      return rule.reply(record);
    }

    return `I am still Learning, I don't have information about it. "${message}" — (server time: ${dayjs(now).format(
      SERVER_TIME_FORMAT,
    )})`;
  }

  private findRule(message: string): TopicRule | undefined {
    const lowercase = message.toLowerCase();
    return rules.find((rule) => rule.triggers.some((trigger) => lowercase.includes(trigger)));
  }
}
