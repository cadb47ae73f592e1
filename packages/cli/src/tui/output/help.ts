import { t } from '../theme.js'

/**
 * renderHelp — print the command language, one entry per command.
 */
export function renderHelp(): void {
  const section = (label: string) =>
    '\n  ' + t.dim('─── ') + t.blue(label) + '\n'

  const cmd = (usage: string, desc: string) => {
    const pad = ' '.repeat(Math.max(1, 58 - usage.length))
    return '  ' + t.white(usage) + t.dim(pad + desc) + '\n'
  }

  let out = '\n'

  out += section('variables & theme')
  out += cmd('set VAR VALUE',                                    'assign a variable')
  out += cmd('theme --name N --component C --bgcolor B --fgcolor F', 'set component colours')

  out += section('key bindings')
  out += cmd('map VIEW FROM TO',                                 'map a key sequence')
  out += cmd('unmap VIEW FROM',                                  'remove a mapping')

  out += section('layout')
  out += cmd('addtab NAME',                                      'open a tab')
  out += cmd('rmtab',                                            'close the active tab')
  out += cmd('addview VIEW [ARGS...]',                           'add a view to the tab')
  out += cmd('split|hsplit|vsplit VIEW [ARGS...]',               'split the active view')
  out += cmd('q',                                                'quit')

  out += section('shell')
  out += cmd('help',                                             'show this help')
  out += cmd('Ctrl+C  Ctrl+D',                                   'exit')

  out += '\n  ' + t.dim('separate commands with a newline or ;') + '\n'

  process.stdout.write(out)
}
