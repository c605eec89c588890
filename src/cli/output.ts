/**
 * Terminal output for CLI commands: short, no timestamps.
 * Diagnostics go through shared/logger.ts instead.
 */

import chalk from 'chalk'

export function success(message: string): void {
  console.log(chalk.green('✓'), message)
}

export function error(message: string): void {
  console.error(chalk.red('✗'), message)
}

export function warn(message: string): void {
  console.warn(chalk.yellow('!'), message)
}

export function info(message: string): void {
  console.log(chalk.blue('ℹ'), message)
}

export function header(title: string): void {
  console.log()
  console.log(chalk.bold(title))
  console.log(chalk.dim('─'.repeat(Math.min(title.length + 4, 40))))
}

export interface ListItem {
  label: string
  value: string | number | null | undefined
  dim?: boolean
}

/** Aligned `label: value` lines */
export function list(items: ListItem[], indent = 2): void {
  const prefix = ' '.repeat(indent)
  const maxLabelLen = Math.max(...items.map(i => i.label.length))

  for (const item of items) {
    const label = chalk.gray(item.label.padEnd(maxLabelLen) + ':')
    const value = String(item.value ?? '-')
    console.log(`${prefix}${label} ${item.dim ? chalk.dim(value) : value}`)
  }
}

export function bulletList(items: string[], bullet = '•', indent = 2): void {
  const prefix = ' '.repeat(indent)
  for (const item of items) {
    console.log(`${prefix}${chalk.dim(bullet)} ${item}`)
  }
}

export interface TableColumn<T> {
  key: keyof T & string
  header: string
  width?: number
  align?: 'left' | 'right'
}

/** Table lines, without printing */
export function formatTable<T extends Record<string, string | number>>(data: T[], columns: TableColumn<T>[]): string[] {
  if (data.length === 0) return [chalk.dim('  (none)')]

  const widths = columns.map(col => {
    if (col.width) return col.width
    const maxDataLen = Math.max(...data.map(row => String(row[col.key]).length))
    return Math.max(col.header.length, maxDataLen)
  })

  const headerRow = columns.map((col, i) => chalk.bold(col.header.padEnd(widths[i] ?? col.header.length))).join('  ')
  const separator = widths.map(w => '─'.repeat(w)).join('──')
  const rows = data.map(row =>
    columns
      .map((col, i) => {
        const width = widths[i] ?? 10
        const value = String(row[col.key])
        return col.align === 'right' ? value.padStart(width) : value.padEnd(width)
      })
      .join('  ')
  )

  return ['  ' + headerRow, '  ' + chalk.dim(separator), ...rows.map(row => '  ' + row)]
}

export function table<T extends Record<string, string | number>>(data: T[], columns: TableColumn<T>[]): void {
  for (const line of formatTable(data, columns)) {
    console.log(line)
  }
}
