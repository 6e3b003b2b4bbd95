/**
 * Token Ledger Tests
 * Collateral faucet token and the authority-gated pegged token
 */

import { ethers } from "ethers";
import { CollateralToken } from "../collateral-token";
import {
  BurnAmountExceedsBalanceError,
  InsufficientAllowanceError,
  InsufficientBalanceError,
  MustBeMoreThanZeroError,
  NegativeAmountError,
  UnauthorizedMinterError,
  ZeroAddressError,
} from "../errors";
import { StateJournal } from "../journal";
import { MintAuthority, StableToken } from "../stable-token";
import { OTHER, USER } from "./helpers";

const ENGINE = ethers.getAddress("0x" + "ee".repeat(20));

describe("CollateralToken", () => {
  let token: CollateralToken;

  beforeEach(() => {
    token = new CollateralToken({
      address: "0x" + "aa".repeat(20),
      name: "Wrapped Ether",
      symbol: "WETH",
      journal: new StateJournal(),
    });
    token.mint(USER, 100n);
  });

  it("should mint to the faucet recipient", () => {
    expect(token.balanceOf(USER)).toBe(100n);
    expect(token.totalSupply()).toBe(100n);
    expect(token.decimals).toBe(18);
  });

  it("should move balances on transfer", () => {
    expect(token.transfer(USER, OTHER, 30n)).toBe(true);
    expect(token.balanceOf(USER)).toBe(70n);
    expect(token.balanceOf(OTHER)).toBe(30n);
  });

  it("should reject transfers above the balance", () => {
    expect(() => token.transfer(USER, OTHER, 101n)).toThrow(InsufficientBalanceError);
  });

  it("should reject transfers to the zero address", () => {
    expect(() => token.transfer(USER, ethers.ZeroAddress, 1n)).toThrow(ZeroAddressError);
  });

  it("should reject negative amounts", () => {
    expect(() => token.transfer(USER, OTHER, -1n)).toThrow(NegativeAmountError);
    expect(() => token.approve(USER, OTHER, -1n)).toThrow(NegativeAmountError);
  });

  it("should consume allowance on transferFrom", () => {
    token.approve(USER, ENGINE, 50n);
    token.transferFrom(ENGINE, USER, ENGINE, 20n);
    expect(token.allowance(USER, ENGINE)).toBe(30n);
    expect(token.balanceOf(ENGINE)).toBe(20n);
  });

  it("should not decrement an unlimited allowance", () => {
    token.approve(USER, ENGINE, ethers.MaxUint256);
    token.transferFrom(ENGINE, USER, OTHER, 20n);
    expect(token.allowance(USER, ENGINE)).toBe(ethers.MaxUint256);
  });

  it("should reject transferFrom above the allowance without moving funds", () => {
    token.approve(USER, ENGINE, 10n);
    expect(() => token.transferFrom(ENGINE, USER, ENGINE, 11n)).toThrow(InsufficientAllowanceError);
    expect(token.balanceOf(USER)).toBe(100n);
    expect(token.allowance(USER, ENGINE)).toBe(10n);
  });
});

describe("StableToken", () => {
  let authority: MintAuthority;
  let token: StableToken;

  beforeEach(() => {
    authority = new MintAuthority(ENGINE);
    token = new StableToken({
      address: "0x" + "bb".repeat(20),
      name: "Pegged USD",
      symbol: "pUSD",
      authority,
      journal: new StateJournal(),
    });
  });

  it("should expose the authority holder as minter", () => {
    expect(token.minter).toBe(ENGINE);
  });

  it("should mint with the authority", () => {
    expect(token.mint(authority, USER, 500n)).toBe(true);
    expect(token.balanceOf(USER)).toBe(500n);
    expect(token.totalSupply()).toBe(500n);
  });

  it("should reject a foreign authority even with the same holder", () => {
    const forged = new MintAuthority(ENGINE);
    expect(() => token.mint(forged, USER, 1n)).toThrow(UnauthorizedMinterError);
    expect(() => token.burn(forged, 1n)).toThrow(UnauthorizedMinterError);
  });

  it("should reject minting to the zero address", () => {
    expect(() => token.mint(authority, ethers.ZeroAddress, 1n)).toThrow(ZeroAddressError);
  });

  it("should reject zero mint and burn amounts", () => {
    expect(() => token.mint(authority, USER, 0n)).toThrow(MustBeMoreThanZeroError);
    expect(() => token.burn(authority, 0n)).toThrow(MustBeMoreThanZeroError);
  });

  it("should burn from the holder's balance only", () => {
    token.mint(authority, ENGINE, 40n);
    token.mint(authority, USER, 100n);
    token.burn(authority, 30n);
    expect(token.balanceOf(ENGINE)).toBe(10n);
    expect(token.balanceOf(USER)).toBe(100n);
    expect(token.totalSupply()).toBe(110n);
  });

  it("should reject burning more than the holder has", () => {
    token.mint(authority, ENGINE, 5n);
    expect(() => token.burn(authority, 6n)).toThrow(BurnAmountExceedsBalanceError);
  });
});
