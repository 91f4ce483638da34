/**
 * Shared array utility functions.
 * Quickselect for k-th smallest element, and the median built on it.
 */

/**
 * Quickselect algorithm to find k-th smallest element.
 * Average O(n), worst case O(n^2).
 *
 * Makes a copy of the array to avoid modifying the original.
 *
 * @param arr - Input array
 * @param k - Zero-based index of the desired element
 * @returns The k-th smallest element
 */
export function quickselect(arr: readonly number[], k: number): number {
  if (arr.length === 0) return 0;
  if (k >= arr.length) k = arr.length - 1;

  const copy = arr.slice();
  return quickselectInPlace(copy, 0, copy.length - 1, k);
}

/**
 * In-place quickselect using median-of-three pivot selection.
 */
export function quickselectInPlace(arr: number[], left: number, right: number, k: number): number {
  if (left === right) return arr[left];

  const mid = Math.floor((left + right) / 2);
  if (arr[mid] < arr[left]) swap(arr, left, mid);
  if (arr[right] < arr[left]) swap(arr, left, right);
  if (arr[right] < arr[mid]) swap(arr, mid, right);

  const pivotIndex = partition(arr, left, right, mid);

  if (k === pivotIndex) return arr[k];
  if (k < pivotIndex) return quickselectInPlace(arr, left, pivotIndex - 1, k);
  return quickselectInPlace(arr, pivotIndex + 1, right, k);
}

/**
 * Partition array around pivot value.
 */
export function partition(arr: number[], left: number, right: number, pivotIndex: number): number {
  const pivotValue = arr[pivotIndex];
  swap(arr, pivotIndex, right);
  let storeIndex = left;

  for (let i = left; i < right; i++) {
    if (arr[i] < pivotValue) {
      swap(arr, i, storeIndex);
      storeIndex++;
    }
  }

  swap(arr, storeIndex, right);
  return storeIndex;
}

/**
 * Swap two elements in an array.
 */
export function swap(arr: number[], i: number, j: number): void {
  const temp = arr[i];
  arr[i] = arr[j];
  arr[j] = temp;
}

/**
 * Median of a sample. Even-length samples average the two middle values.
 * Returns 0 for an empty array, like quickselect.
 */
export function median(arr: readonly number[]): number {
  const n = arr.length;
  if (n === 0) return 0;

  const upper = quickselect(arr, Math.floor(n / 2));
  if (n % 2 === 1) return upper;

  const lower = quickselect(arr, n / 2 - 1);
  return (lower + upper) / 2;
}
