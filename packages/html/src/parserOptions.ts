import type { ParserOptions } from '@tagtree/core'
import { isVoidTag, makeMap } from '@vue/shared'

export const isRawTextTag: (tag: string) => boolean = makeMap('script,style')

export const htmlParserOptions: ParserOptions = {
  // void elements like <br> and <img> never have children
  isSelfClosingTag: isVoidTag,
  isRawTextTag,
}
