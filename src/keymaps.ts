import type { AgentlineConfig } from './config.js';

/**
 * Neovim Lua snippet wiring the CLI to `<leader>oc` (ask, normal and visual
 * mode) and `<leader>oC` (open the agent), using the configured leader.
 */
export function renderKeymaps(config: Readonly<AgentlineConfig>, executable = 'agentline'): string {
  const { leader } = config.keys;
  const exe = luaString(executable);

  return [
    `-- agentline keymaps (leader ${leader})`,
    'local function agentline_args(cmd)',
    `  local args = { ${exe}, cmd, "--file", vim.api.nvim_buf_get_name(0), "--line", tostring(vim.fn.line(".")), "--cwd", vim.fn.getcwd() }`,
    '  if vim.fn.mode():match("^[vV\\22]") then',
    '    table.insert(args, "--selection")',
    '    table.insert(args, vim.fn.line("v") .. "," .. vim.fn.line("."))',
    '  end',
    '  return args',
    'end',
    '',
    '_G.agentline_complete = function(_, line)',
    `  return vim.fn.systemlist({ ${exe}, "complete", "--", line })`,
    'end',
    '',
    `vim.keymap.set({ "n", "x" }, ${luaString(`${leader}oc`)}, function()`,
    '  local args = agentline_args("prompt")',
    '  vim.ui.input({ prompt = "Ask agent: ", completion = "customlist,v:lua.agentline_complete" }, function(input)',
    '    if input and input ~= "" then',
    '      table.insert(args, "--")',
    '      table.insert(args, input)',
    '      vim.fn.jobstart(args, { detach = true })',
    '    end',
    '  end)',
    'end, { desc = "Ask agent with context" })',
    '',
    `vim.keymap.set("n", ${luaString(`${leader}oC`)}, function()`,
    `  vim.fn.jobstart({ ${exe}, "open" }, { detach = true })`,
    'end, { desc = "Open agent" })',
    '',
  ].join('\n');
}

function luaString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}
