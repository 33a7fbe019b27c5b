export const HELP_TEXT = [
  '***Data Operations***',
  'Commands:',
  '  create_table <table_name> <col1:type> ..  - create a table (types: int, str, bool)',
  '  list_tables                               - show all tables',
  '  drop_table <table_name>                   - delete a table',
  '  info <table_name>                         - show table columns and record count',
  '  insert into <table> values (<val1>, ..)   - insert a record',
  '  select from <table> [where <col> = <val>] - read records',
  '  update <table> set <col> = <val> where <col> = <val> - update records',
  '  delete from <table> where <col> = <val>   - delete records',
  '',
  'General:',
  '  help - show this help',
  '  exit - exit the program'
].join('\n');
