import StreamFilterer, { filterByTarget } from './filterer.js';
import StreamSorter, { rankCandidates, sortByKey } from './sorter.js';
import StreamLimiter from './limiter.js';

export {
  StreamFilterer,
  StreamSorter,
  StreamLimiter,
  filterByTarget,
  rankCandidates,
  sortByKey,
};

export {
  evaluatePredicate,
  sortKeyValue,
  testPattern,
} from './expression.js';
