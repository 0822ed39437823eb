import { describe, it, expect } from 'vitest'
import { coefficientOfVariation, mean, quantile, removeOutliersIqr, stddev } from '../statistics.js'

describe('statistics', () => {
  it('computes mean and population standard deviation', () => {
    expect(mean([2, 4, 4, 4, 5, 5, 7, 9])).toBe(5)
    expect(stddev([2, 4, 4, 4, 5, 5, 7, 9])).toBe(2)
    expect(coefficientOfVariation([2, 4, 4, 4, 5, 5, 7, 9])).toBe(0.4)
  })

  it('interpolates quartiles between ranks', () => {
    expect(quantile([1, 2, 3, 4], 0.25)).toBe(1.75)
    expect(quantile([1, 2, 3, 4], 0.75)).toBe(3.25)
    expect(quantile([4, 1, 3, 2], 0.5)).toBe(2.5)
  })

  it('removes values beyond 1.5 IQR from the quartiles', () => {
    // Q1 2.25, Q3 4.75, fences -1.5 and 8.5
    const result = removeOutliersIqr([1, 2, 3, 4, 5, 100])
    expect(result.kept).toEqual([1, 2, 3, 4, 5])
    expect(result.excluded).toEqual([100])
    expect(result.upperFence).toBe(8.5)
  })

  it('treats an empty or constant zero series as having no variation', () => {
    expect(mean([])).toBe(0)
    expect(coefficientOfVariation([0, 0, 0])).toBe(0)
  })
})
