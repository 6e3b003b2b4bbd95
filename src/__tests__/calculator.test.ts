/**
 * Calculator Tests
 * Fixed-point valuation, health factor and liquidation bonus math
 */

import { ethers } from "ethers";
import {
  calculateHealthFactor,
  calculateLiquidationBonus,
  calculateTokenAmountFromUsd,
  calculateUsdValue,
} from "../calculator";
import { MAX_HEALTH_FACTOR, MIN_HEALTH_FACTOR } from "../constants";

describe("calculateUsdValue", () => {
  it("should value 15 ETH at $2000 as $30,000", () => {
    expect(calculateUsdValue(2000_00000000n, ethers.parseEther("15"))).toBe(ethers.parseEther("30000"));
  });

  it("should truncate sub-unit results to zero", () => {
    expect(calculateUsdValue(1n, 1n)).toBe(0n);
  });

  it("should be zero for zero amount", () => {
    expect(calculateUsdValue(2000_00000000n, 0n)).toBe(0n);
  });
});

describe("calculateTokenAmountFromUsd", () => {
  it("should convert $100 to 0.05 ETH at $2000", () => {
    expect(calculateTokenAmountFromUsd(2000_00000000n, ethers.parseEther("100"))).toBe(
      ethers.parseEther("0.05"),
    );
  });

  it("should invert calculateUsdValue when nothing truncates", () => {
    const usd = calculateUsdValue(2000_00000000n, ethers.parseEther("5"));
    expect(usd).toBe(ethers.parseEther("10000"));
    expect(calculateTokenAmountFromUsd(2000_00000000n, usd)).toBe(ethers.parseEther("5"));
  });

  it("should floor non-terminating quotients", () => {
    expect(calculateTokenAmountFromUsd(18_00000000n, ethers.parseEther("100"))).toBe(5555555555555555555n);
  });
});

describe("calculateHealthFactor", () => {
  it("should return the max value when there is no debt", () => {
    expect(calculateHealthFactor(0n, ethers.parseEther("1000"))).toBe(MAX_HEALTH_FACTOR);
    expect(calculateHealthFactor(0n, 0n)).toBe(ethers.MaxUint256);
  });

  it("should be exactly 1.0 at 200% collateralization", () => {
    expect(calculateHealthFactor(ethers.parseEther("100"), ethers.parseEther("200"))).toBe(MIN_HEALTH_FACTOR);
  });

  it("should scale with the collateral-to-debt ratio", () => {
    expect(calculateHealthFactor(ethers.parseEther("100"), ethers.parseEther("150"))).toBe(
      ethers.parseEther("0.75"),
    );
    expect(calculateHealthFactor(ethers.parseEther("100"), ethers.parseEther("20000"))).toBe(
      ethers.parseEther("100"),
    );
  });

  it("should be zero when collateral is worthless", () => {
    expect(calculateHealthFactor(1n, 0n)).toBe(0n);
  });
});

describe("calculateLiquidationBonus", () => {
  it("should pay 10% of the base amount, floored", () => {
    expect(calculateLiquidationBonus(ethers.parseEther("1"))).toBe(ethers.parseEther("0.1"));
    expect(calculateLiquidationBonus(5555555555555555555n)).toBe(555555555555555555n);
    expect(calculateLiquidationBonus(9n)).toBe(0n);
  });
});
