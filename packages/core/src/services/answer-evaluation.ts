import { Rating, type AnswerEvaluation, type CardState, type DifficultyLabel } from '@spaced/shared';

/** 低于该耗时的正确作答视为 Easy */
export const EASY_RESPONSE_MS = 3000;

/** 低于该耗时的正确作答视为 Good，否则为 Hard */
export const GOOD_RESPONSE_MS = 8000;

/**
 * 判定作答结果并推断评分
 *
 * answer 为 null 表示跳过；显式给出的评分优先于推断
 */
export function evaluateAnswer(
  canonicalAnswer: string,
  answer: string | null,
  responseTimeMs: number,
  explicitRating?: Rating,
): AnswerEvaluation {
  const isSkipped = answer === null;
  const isCorrect = !isSkipped && answer === canonicalAnswer;

  return {
    isCorrect,
    isSkipped,
    rating: explicitRating ?? inferRating(isCorrect, isSkipped, responseTimeMs),
  };
}

export function inferRating(isCorrect: boolean, isSkipped: boolean, responseTimeMs: number): Rating {
  if (isSkipped || !isCorrect) {
    return Rating.AGAIN;
  }
  if (responseTimeMs < EASY_RESPONSE_MS) {
    return Rating.EASY;
  }
  if (responseTimeMs < GOOD_RESPONSE_MS) {
    return Rating.GOOD;
  }
  return Rating.HARD;
}

/**
 * 展示层难度标签
 */
export function difficultyLabel(card: Pick<CardState, 'reviewCount' | 'lapseCount'>): DifficultyLabel {
  if (card.reviewCount === 0) {
    return 'New';
  }
  if (card.lapseCount >= 5) {
    return 'Very Hard';
  }
  if (card.lapseCount >= 3) {
    return 'Hard';
  }
  if (card.reviewCount < 3) {
    return 'Learning';
  }
  return 'Review';
}
