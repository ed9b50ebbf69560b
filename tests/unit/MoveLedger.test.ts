import {
  MoveLedger,
  findPayment,
  payableDistances,
} from '../../src/shared/engine/MoveLedger';

describe('findPayment', () => {
  it('prefers a single quantum over a combination', () => {
    expect(findPayment([3, 1, 2], 3)).toEqual([0]);
  });

  it('combines two quanta when no single one matches', () => {
    expect(findPayment([2, 3], 5)).toEqual([0, 1]);
    expect(findPayment([1, 2, 4], 3)).toEqual([0, 1]);
  });

  it('picks the lowest indices among equal-size witnesses', () => {
    expect(findPayment([6, 6, 6, 6], 12)).toEqual([0, 1]);
    expect(findPayment([6, 6, 6, 6], 18)).toEqual([0, 1, 2]);
  });

  it('can spend all four quanta of a doubles roll', () => {
    expect(findPayment([6, 6, 6, 6], 24)).toEqual([0, 1, 2, 3]);
  });

  it('returns null for unpayable, non-positive and fractional distances', () => {
    expect(findPayment([6, 6, 6, 6], 25)).toBeNull();
    expect(findPayment([2, 3], 4)).toBeNull();
    expect(findPayment([5], 0)).toBeNull();
    expect(findPayment([5], -5)).toBeNull();
    expect(findPayment([2, 3], 2.5)).toBeNull();
    expect(findPayment([], 1)).toBeNull();
  });
});

describe('payableDistances', () => {
  it('lists every distinct subset sum in ascending order', () => {
    expect(payableDistances([2, 3])).toEqual([2, 3, 5]);
    expect(payableDistances([6, 6, 6, 6])).toEqual([6, 12, 18, 24]);
    expect(payableDistances([1, 2, 4])).toEqual([1, 2, 3, 4, 5, 6, 7]);
    expect(payableDistances([])).toEqual([]);
  });
});

describe('MoveLedger', () => {
  let ledger: MoveLedger;

  beforeEach(() => {
    ledger = new MoveLedger();
  });

  it('starts empty', () => {
    expect(ledger.isEmpty()).toBe(true);
    expect(ledger.remaining()).toBe(0);
    expect(ledger.canPay(1)).toBe(false);
  });

  it('consumes exactly the witnessing quanta', () => {
    ledger.seed([2, 3]);
    expect(ledger.consume(5)).toEqual([2, 3]);
    expect(ledger.isEmpty()).toBe(true);
  });

  it('consumes a single quantum and keeps the rest', () => {
    ledger.seed([6, 6, 6, 6]);
    expect(ledger.consume(6)).toEqual([6]);
    expect(ledger.values()).toEqual([6, 6, 6]);
    expect(ledger.consume(12)).toEqual([6, 6]);
    expect(ledger.values()).toEqual([6]);
  });

  it('leaves the ledger untouched when the distance is unpayable', () => {
    ledger.seed([4, 1]);
    expect(ledger.pay(3)).toBe(false);
    expect(ledger.consume(3)).toBeNull();
    expect(ledger.values()).toEqual([4, 1]);
  });

  it('re-evaluates payability against the current contents', () => {
    ledger.seed([2, 3]);
    expect(ledger.canPay(5)).toBe(true);
    expect(ledger.pay(2)).toBe(true);
    expect(ledger.canPay(5)).toBe(false);
    expect(ledger.canPay(3)).toBe(true);
  });

  it('spends single quanta by value', () => {
    ledger.seed([5, 2]);
    expect(ledger.holds(2)).toBe(true);
    expect(ledger.holds(7)).toBe(false);
    expect(ledger.payQuantum(7)).toBe(false);
    expect(ledger.payQuantum(2)).toBe(true);
    expect(ledger.values()).toEqual([5]);
  });

  it('finds the smallest quantum strictly above a distance', () => {
    ledger.seed([6, 1, 4]);
    expect(ledger.smallestQuantumAbove(2)).toBe(4);
    expect(ledger.smallestQuantumAbove(4)).toBe(6);
    expect(ledger.smallestQuantumAbove(6)).toBeNull();
  });

  it('reports payable distances for its contents', () => {
    ledger.seed([3, 5]);
    expect(ledger.payableDistances()).toEqual([3, 5, 8]);
  });

  it('does not share its array with callers', () => {
    const quanta = [1, 2];
    ledger.seed(quanta);
    quanta.push(3);
    ledger.values().push(9);
    expect(ledger.values()).toEqual([1, 2]);
  });

  it('clears every quantum', () => {
    ledger.seed([4, 4, 4, 4]);
    ledger.clear();
    expect(ledger.isEmpty()).toBe(true);
  });
});
