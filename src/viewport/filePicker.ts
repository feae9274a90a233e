/**
 * Open the browser's file dialog through a hidden `<input type="file">`.
 *
 * Resolves with the chosen file, or null when the dialog is cancelled.
 * Browsers without a `cancel` event are covered by the window regaining
 * focus: if no `change` follows within FOCUS_SETTLE_MS, the dialog was
 * dismissed.
 */

/** `change` can arrive shortly after the focus that closes the dialog. */
export const FOCUS_SETTLE_MS = 500

export function pickFile(
  input: HTMLInputElement,
  focusTarget: Pick<Window, 'addEventListener' | 'removeEventListener'> = window,
): Promise<File | null> {
  return new Promise((resolve) => {
    let settleTimer: ReturnType<typeof setTimeout> | null = null

    const finish = (file: File | null) => {
      input.removeEventListener('change', onChange)
      input.removeEventListener('cancel', onCancel)
      focusTarget.removeEventListener('focus', onFocus)
      if (settleTimer !== null) clearTimeout(settleTimer)
      // Reset so picking the same file twice still fires `change`.
      input.value = ''
      resolve(file)
    }
    const onChange = () => finish(input.files?.item(0) ?? null)
    const onCancel = () => finish(null)
    const onFocus = () => {
      if (settleTimer === null) settleTimer = setTimeout(() => finish(null), FOCUS_SETTLE_MS)
    }

    input.addEventListener('change', onChange)
    input.addEventListener('cancel', onCancel)
    focusTarget.addEventListener('focus', onFocus)
    input.click()
  })
}
