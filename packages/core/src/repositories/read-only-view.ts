import type { ReadOnlySchedulingView, SchedulingStore } from './types';

/**
 * 为下游分析提供只读视图
 * 返回对象只暴露查询方法，不持有对仓库写接口的引用
 */
export function createReadOnlyView(store: SchedulingStore): ReadOnlySchedulingView {
  const { cards, history } = store;

  return Object.freeze({
    queryDue: (...args: Parameters<ReadOnlySchedulingView['queryDue']>) =>
      Object.freeze(cards.queryDue(...args)),
    listHistoryByCard: (cardId: string) => Object.freeze(history.listByCard(cardId)),
    listRecentHistory: (learnerId: string, since: Date) =>
      Object.freeze(history.listRecentByLearner(learnerId, since)),
  });
}
