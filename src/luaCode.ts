/**
 * Receiver routines that are typed into the interpreter before the first upload.
 *
 * `recv()` switches the UART into raw mode, answers with the ready prompt and
 * waits for a NUL terminated file name, then for 130 byte chunk frames until a
 * zero length frame arrives. Every step is acknowledged with 0x06.
 * `shafile(f)` prints the hex SHA1 digest of a file.
 *
 * The literal 9600 is replaced with the session baud rate before sending, so the
 * receiver restores the rate the host is talking at.
 */
export const RECEIVER_LUA = `
function recv_block(d)
  if string.byte(d, 1) == 1 then
    size = string.byte(d, 2)
    uart.write(0, '\\006')
    if size > 0 then
      file.write(string.sub(d, 3, 3 + size - 1))
    else
      file.close()
      uart.on('data')
      uart.setup(0, 9600, 8, 0, 1, 1)
    end
  else
    uart.write(0, '\\021' .. d)
    uart.setup(0, 9600, 8, 0, 1, 1)
    uart.on('data')
  end
end
function recv_name(d)
  d = string.gsub(d, '\\000', '')
  file.remove(d)
  file.open(d, 'w')
  uart.on('data', 130, recv_block, 0)
  uart.write(0, '\\006')
end
function recv()
  uart.setup(0, 9600, 8, 0, 1, 0)
  uart.on('data', '\\000', recv_name, 0)
  uart.write(0, 'C> ')
end
function shafile(f)
  file.open(f, 'r')
  print(crypto.toHex(crypto.hash('sha1', file.read())))
  file.close()
end
`;
