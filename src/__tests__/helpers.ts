import { ethers } from "ethers";
import { ManualClock } from "../clock";
import { loadConfig } from "../config";
import { deployStablecoinSystem, StablecoinSystem } from "../deploy";

export const DEPLOYER = ethers.getAddress("0x" + "d0".repeat(20));
export const USER = ethers.getAddress("0x" + "11".repeat(20));
export const LIQUIDATOR = ethers.getAddress("0x" + "22".repeat(20));
export const OTHER = ethers.getAddress("0x" + "33".repeat(20));

export const ETH_2000 = 2000_00000000n;

export interface TestSystem extends StablecoinSystem {
  manualClock: ManualClock;
}

export function deployTestSystem(env: Record<string, string> = {}): TestSystem {
  const manualClock = new ManualClock();
  const system = deployStablecoinSystem(loadConfig({ NODE_ENV: "test", ...env }), {
    deployer: DEPLOYER,
    clock: manualClock,
  });
  return { ...system, manualClock };
}

/** Faucet wETH to `account` and approve the engine for all of it */
export function fundWeth(system: StablecoinSystem, account: string, amount: bigint): void {
  system.weth.mint(account, amount);
  system.weth.approve(account, system.engine.address, amount);
}

export function fundWbtc(system: StablecoinSystem, account: string, amount: bigint): void {
  system.wbtc.mint(account, amount);
  system.wbtc.approve(account, system.engine.address, amount);
}

/** Deposit `collateral` wETH and mint `debt` in one call */
export function openPosition(system: StablecoinSystem, account: string, collateral: bigint, debt: bigint): void {
  fundWeth(system, account, collateral);
  system.engine.connect(account).depositAndMint(system.weth.address, collateral, debt);
}
