export { OrderStatisticStore, selectionRank } from './order-statistic-store.js';
