import { expect } from 'chai';
import { MetricsCalculator, classifySentiment, toCorrelationRows } from '../src/core/analysis/metrics-calculator';
import { BASE_TIME, makeQuote, makeSeries } from './fixtures';

describe('MetricsCalculator', () => {
  const calculator = new MetricsCalculator({ volatilityWindow: 7, riskFreeRate: 0.02 });
  const global = { totalMarketCapUsd: 1200, totalVolumeUsd: 0, extractedAt: new Date(BASE_TIME).toISOString() };

  describe('calculateMarketDominance', () => {
    it('should compute shares of the total cap with a dense rank', () => {
      const result = calculator.calculateMarketDominance(
        [
          makeQuote('a', { market_cap: 600 }),
          makeQuote('b', { market_cap: 300 }),
          makeQuote('c', { market_cap: 300 }),
          makeQuote('d', { market_cap: null }),
        ],
        global
      );

      expect(result).to.not.equal(null);
      expect(result?.get('a')).to.deep.equal({ market_dominance_pct: 50, dominance_rank: 1 });
      expect(result?.get('b')).to.deep.equal({ market_dominance_pct: 25, dominance_rank: 2 });
      expect(result?.get('c')).to.deep.equal({ market_dominance_pct: 25, dominance_rank: 2 });
      expect(result?.has('d')).to.equal(false);
    });

    it('should return null without quotes or a positive total', () => {
      expect(calculator.calculateMarketDominance([], global)).to.equal(null);
      expect(calculator.calculateMarketDominance([makeQuote('a')], { ...global, totalMarketCapUsd: 0 })).to.equal(null);
    });
  });

  describe('calculateVolatility', () => {
    it('should report zero volatility for a constant series', () => {
      const result = calculator.calculateVolatility([makeSeries('flat', [100, 100, 100])]);

      expect(result.get('flat')).to.deep.equal({
        volatility_30d: 0,
        volatility_7d: 0,
        volatility_window: 7,
        price_change_30d_pct: 0,
        avg_price_30d: 100,
        max_price_30d: 100,
        min_price_30d: 100,
        observation_count: 3,
      });
    });

    it('should annualize the sample deviation of daily returns', () => {
      const result = calculator.calculateVolatility([makeSeries('coin', [100, 110, 99])]);
      const metrics = result.get('coin');

      // returns are +10% and -10%
      const expected = Math.sqrt(0.02) * Math.sqrt(365);
      expect(metrics?.volatility_30d).to.be.approximately(expected, 1e-9);
      expect(metrics?.volatility_7d).to.be.approximately(expected, 1e-9);
      expect(metrics?.price_change_30d_pct).to.be.approximately(-1, 1e-9);
      expect(metrics?.max_price_30d).to.equal(110);
      expect(metrics?.min_price_30d).to.equal(99);
      expect(metrics?.avg_price_30d).to.be.approximately(103, 1e-9);
    });

    it('should limit the short-window figure to the latest returns', () => {
      const windowed = new MetricsCalculator({ volatilityWindow: 2, riskFreeRate: 0.02 });
      const metrics = windowed.calculateVolatility([makeSeries('coin', [100, 100, 100, 110, 99])]).get('coin');

      // returns are 0, 0, +10%, -10%; the window keeps the last two
      expect(metrics?.volatility_7d).to.be.approximately(Math.sqrt(0.02) * Math.sqrt(365), 1e-9);
      expect(metrics?.volatility_30d).to.be.approximately(Math.sqrt(0.02 / 3) * Math.sqrt(365), 1e-9);
      expect(metrics?.volatility_window).to.equal(2);
      expect(metrics?.observation_count).to.equal(5);
    });

    it('should sort points by timestamp before computing', () => {
      const series = makeSeries('coin', [100, 110, 99]);
      const shuffled = { ...series, prices: [series.prices[2], series.prices[0], series.prices[1]] };

      expect(calculator.calculateVolatility([shuffled]).get('coin')?.price_change_30d_pct).to.be.approximately(-1, 1e-9);
    });

    it('should skip coins with fewer than two prices or a zero divisor', () => {
      const result = calculator.calculateVolatility([makeSeries('short', [100]), makeSeries('zero', [0, 10, 20])]);
      expect(result.size).to.equal(0);
    });
  });

  describe('calculateCorrelationMatrix', () => {
    const matrix = calculator.calculateCorrelationMatrix([
      makeSeries('a', [100, 110, 99, 108.9]),
      makeSeries('b', [200, 220, 198, 217.8]),
      makeSeries('c', [100, 90, 99, 89.1]),
    ]);

    it('should keep a unit diagonal and symmetric entries', () => {
      expect(matrix.coinIds).to.deep.equal(['a', 'b', 'c']);
      matrix.values.forEach((row, i) => expect(row[i]).to.equal(1));
      expect(matrix.values[0][2]).to.equal(matrix.values[2][0]);
      expect(matrix.values[0][1]).to.equal(matrix.values[1][0]);
    });

    it('should correlate identical and opposite return paths', () => {
      expect(matrix.values[0][1]).to.be.approximately(1, 1e-9);
      expect(matrix.values[0][2]).to.be.approximately(-1, 1e-9);
    });

    it('should leave the coefficient null for a zero-variance series', () => {
      const result = calculator.calculateCorrelationMatrix([
        makeSeries('a', [100, 110, 99]),
        makeSeries('flat', [5, 5, 5]),
      ]);
      expect(result.values[0][1]).to.equal(null);
      expect(result.values[1][1]).to.equal(1);
    });

    it('should use only timestamps every coin has', () => {
      const longer = makeSeries('long', [100, 110, 99, 108.9, 50]);
      const shorter = makeSeries('short', [100, 110, 99, 108.9]);
      const result = calculator.calculateCorrelationMatrix([longer, shorter]);
      expect(result.values[0][1]).to.be.approximately(1, 1e-9);
    });

    it('should return an empty matrix without history', () => {
      expect(calculator.calculateCorrelationMatrix([])).to.deep.equal({ coinIds: [], values: [] });
    });

    it('should flatten into ordered pairs without the diagonal', () => {
      const rows = toCorrelationRows(matrix, '2024-01-01');
      expect(rows).to.have.length(6);
      expect(rows.some(row => row.coin_id_1 === row.coin_id_2)).to.equal(false);
      expect(rows[0]).to.include({ extracted_date: '2024-01-01', coin_id_1: 'a', coin_id_2: 'b' });
    });
  });

  describe('calculateSharpeRatio', () => {
    it('should return zero for a zero-volatility series', () => {
      const result = calculator.calculateSharpeRatio([makeSeries('flat', [50, 50, 50, 50])]);
      expect(result.get('flat')).to.deep.equal({ annualized_return: 0, annualized_volatility: 0, sharpe_ratio: 0 });
    });

    it('should annualize by the number of observations', () => {
      const metrics = calculator.calculateSharpeRatio([makeSeries('coin', [100, 110, 99])]).get('coin');
      const annualizedReturn = Math.pow(0.99, 365 / 3) - 1;
      const annualizedVolatility = Math.sqrt(0.02) * Math.sqrt(365);

      expect(metrics?.annualized_return).to.be.approximately(annualizedReturn, 1e-9);
      expect(metrics?.annualized_volatility).to.be.approximately(annualizedVolatility, 1e-9);
      expect(metrics?.sharpe_ratio).to.be.approximately((annualizedReturn - 0.02) / annualizedVolatility, 1e-9);
    });
  });

  describe('calculateFearGreedScore', () => {
    it('should need at least seven prices', () => {
      expect(calculator.calculateFearGreedScore([makeSeries('coin', [1, 1, 1, 1, 1, 1])]).size).to.equal(0);
    });

    it('should use a neutral volume component with seven volumes or fewer', () => {
      const metrics = calculator.calculateFearGreedScore([makeSeries('coin', new Array<number>(7).fill(10))]).get('coin');
      expect(metrics).to.deep.equal({
        fear_greed_score: 65,
        sentiment: 'Greed',
        momentum_component: 50,
        volatility_component: 100,
        volume_component: 50,
      });
    });

    it('should compare the latest and earliest volume windows', () => {
      const volumes = [...new Array<number>(7).fill(100), ...new Array<number>(7).fill(150)];
      const metrics = calculator.calculateFearGreedScore([makeSeries('coin', new Array<number>(14).fill(10), volumes)]).get('coin');

      expect(metrics?.volume_component).to.equal(100);
      expect(metrics?.fear_greed_score).to.equal(85);
      expect(metrics?.sentiment).to.equal('Extreme Greed');
    });

    it('should fall back to a neutral volume component when the earliest volumes are zero', () => {
      const volumes = [...new Array<number>(7).fill(0), ...new Array<number>(7).fill(100)];
      const metrics = calculator.calculateFearGreedScore([makeSeries('coin', new Array<number>(14).fill(10), volumes)]).get('coin');

      expect(metrics?.volume_component).to.equal(50);
      expect(metrics?.fear_greed_score).to.equal(65);
    });

    it('should floor the volume component when volume more than halves', () => {
      const volumes = [...new Array<number>(7).fill(100), ...new Array<number>(7).fill(40)];
      const metrics = calculator.calculateFearGreedScore([makeSeries('coin', new Array<number>(14).fill(10), volumes)]).get('coin');

      expect(metrics?.volume_component).to.equal(0);
      expect(metrics?.fear_greed_score).to.equal(45);
      expect(metrics?.sentiment).to.equal('Neutral');
    });

    it('should keep every component within 0 and 100', () => {
      const crash = [100, 50, 20, 5, 2, 1, 0.5, 0.1];
      const metrics = calculator.calculateFearGreedScore([makeSeries('coin', crash)]).get('coin');

      expect(metrics?.momentum_component).to.equal(0);
      expect(metrics?.volatility_component).to.equal(0);
      expect(metrics?.fear_greed_score).to.equal(20);
      expect(metrics?.sentiment).to.equal('Fear');
    });
  });

  describe('classifySentiment', () => {
    it('should use half-open intervals', () => {
      expect(classifySentiment(0)).to.equal('Extreme Fear');
      expect(classifySentiment(19.999)).to.equal('Extreme Fear');
      expect(classifySentiment(20)).to.equal('Fear');
      expect(classifySentiment(40)).to.equal('Neutral');
      expect(classifySentiment(60)).to.equal('Greed');
      expect(classifySentiment(79.9)).to.equal('Greed');
      expect(classifySentiment(80)).to.equal('Extreme Greed');
      expect(classifySentiment(100)).to.equal('Extreme Greed');
    });
  });
});
