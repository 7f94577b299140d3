export { TransactionLedger, HistoryFilter } from './ledger.service';
