// registry/actions.ts: Pausable market actions

export type Action =
  | 'Mint'
  | 'Redeem'
  | 'Borrow'
  | 'Repay'
  | 'Seize'
  | 'Liquidate'
  | 'Transfer'
  | 'EnterMarket'
  | 'ExitMarket';

export const ALL_ACTIONS: readonly Action[] = [
  'Mint',
  'Redeem',
  'Borrow',
  'Repay',
  'Seize',
  'Liquidate',
  'Transfer',
  'EnterMarket',
  'ExitMarket',
];

export function isAction(value: string): value is Action {
  return ALL_ACTIONS.some((action) => action === value);
}
