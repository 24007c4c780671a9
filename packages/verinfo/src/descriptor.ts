import type { DescriptorFields } from './types'

/**
 * Fixed file info constants: all flag bits valid, no flags set,
 * VOS_NT_WINDOWS32, VFT_APP, no subtype
 */
export const FIXED_FILE_INFO = {
  mask: '0x3f',
  flags: '0x0',
  OS: '0x40004',
  fileType: '0x1',
  subtype: '0x0',
  date: '(0, 0)',
} as const

/**
 * U.S. English, Unicode
 */
export const STRING_TABLE_ID = '040904B0'
export const TRANSLATION = '[1033, 1200]'

function quote(value: string): string {
  return `u'${value.replace(/\\/g, '\\\\').replace(/'/g, '\\\'')}'`
}

function stringStruct(name: string, value: string): string {
  return `StringStruct(${quote(name)}, ${quote(value)})`
}

/**
 * Render the `VSVersionInfo` block executable packagers read to embed
 * version information into a Windows binary
 */
export function renderDescriptor({ version, parts, strings = {} }: DescriptorFields): string {
  const tuple = `(${parts.join(',')})`

  const entries = [
    stringStruct('FileVersion', version),
    stringStruct('ProductVersion', version),
    ...Object.entries(strings)
      .filter(([name]) => name !== 'FileVersion' && name !== 'ProductVersion')
      .map(([name, value]) => stringStruct(name, value)),
  ]

  return `# UTF-8
#
# For more details about fixed file info 'ffi' see:
# http://msdn.microsoft.com/en-us/library/ms646997.aspx
VSVersionInfo(
  ffi=FixedFileInfo(
    filevers=${tuple},
    prodvers=${tuple},
    mask=${FIXED_FILE_INFO.mask},
    flags=${FIXED_FILE_INFO.flags},
    OS=${FIXED_FILE_INFO.OS},
    fileType=${FIXED_FILE_INFO.fileType},
    subtype=${FIXED_FILE_INFO.subtype},
    date=${FIXED_FILE_INFO.date}
    ),
  kids=[
    StringFileInfo(
      [
      StringTable(
        ${quote(STRING_TABLE_ID)},
        [${entries.join(',\n        ')}])
      ]),
    VarFileInfo([VarStruct(u'Translation', ${TRANSLATION})])
  ]
)
`
}
