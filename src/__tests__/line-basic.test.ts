import { LineBasic, DEFAULT_MAX_STEPS, splitLines } from '../line-basic';
import { INFINITE_LOOP_ERROR } from '../line-dispatcher';
import { exactLabelResolver } from '../label-resolver';

describe('LineBasic', () => {
  let basic: LineBasic;

  beforeEach(() => {
    basic = new LineBasic({ debug: false });
  });

  describe('Loading', () => {
    test('should trim every loaded line', () => {
      basic.load('  print 1  \r\n\t20 end');
      expect(basic.getProgram()).toEqual(['print 1', '20 end']);
    });

    test('should replace the previous program and clear output', () => {
      basic.execute('print 1');
      basic.load('print 2');
      expect(basic.getProgram()).toEqual(['print 2']);
      expect(basic.getOutput()).toBe('');
    });

    test('should not add a line for a trailing newline', () => {
      basic.load('print 1\n');
      expect(basic.getProgram()).toEqual(['print 1']);

      basic.load('print 1\n\n\n');
      expect(basic.getProgram()).toEqual(['print 1']);
    });

    test('should keep blank lines that are not at the end', () => {
      expect(splitLines('a\n\nb\n')).toEqual(['a', '', 'b']);
    });

    test('should keep whitespace-only trailing segments until trimming', () => {
      basic.load('print 1\n  ');
      expect(basic.getProgram()).toEqual(['print 1', '']);
    });

    test('should load a lone newline as an empty program', () => {
      basic.load('\n');
      expect(basic.getProgram()).toEqual([]);
      expect(basic.execute('\n')).toBe('');
      expect(basic.getStepCount()).toBe(0);
    });

    test('should run an empty program without output', () => {
      expect(basic.execute('')).toBe('');
      expect(basic.getProgram()).toEqual(['']);
    });

    test('should keep variables across loads', () => {
      basic.execute('x=3');
      expect(basic.execute('print x*2')).toBe('6.0\n');
    });
  });

  describe('Statements', () => {
    test('should print with standard precedence', () => {
      expect(basic.execute('print 2+3*4')).toBe('14.0\n');
    });

    test('should echo assignments and use them later', () => {
      expect(basic.execute('x=5\nprint x+1')).toBe('x = 5.0\n6.0\n');
      expect(basic.getVariables()).toEqual({ x: 5 });
    });

    test('should remove spaces from assignments', () => {
      expect(basic.execute('x = 2 + 3')).toBe('x = 5.0\n');
    });

    test('should remove tabs from assignments', () => {
      expect(basic.execute('x\t=\t5\nprint x')).toBe('x = 5.0\n5.0\n');
      expect(basic.getVariables()).toEqual({ x: 5 });
    });

    test('should evaluate print expressions with spaces intact', () => {
      expect(basic.execute('print 2 + 3')).toBe('2.0\n');
    });

    test('should strip labels and comments', () => {
      const output = basic.execute('10 x=4 // set x\n20 print x // show it');
      expect(output).toBe('x = 4.0\n4.0\n');
    });

    test('should skip blank and comment-only lines while counting them as steps', () => {
      expect(basic.execute('// header\n\nprint 1')).toBe('1.0\n');
      expect(basic.getStepCount()).toBe(3);
    });

    test('should stop at end', () => {
      expect(basic.execute('end\nprint 1')).toBe('');
      expect(basic.execute('print 1\nend\nprint 2')).toBe('1.0\n');
      expect(basic.getSnapshot()).toEqual({ cursor: 3, steps: 2, halted: false });
    });

    test('should print infinity and NaN for division by zero', () => {
      expect(basic.execute('print 1/0\nprint 0/0')).toBe('Infinity\nNaN\n');
    });

    test('should treat any line containing "=" without goto as an assignment', () => {
      expect(basic.execute('let x = 1')).toBe('letx = 1.0\n');
    });
  });

  describe('Control Flow', () => {
    test('should jump forward over skipped lines', () => {
      expect(basic.execute('if (1<2) goto 30\nprint 99\n30 print 1')).toBe('1.0\n');
    });

    test('should fall through when the condition is false', () => {
      expect(basic.execute('if (2<1) goto 30\nprint 99\n30 print 1')).toBe('99.0\n1.0\n');
    });

    test('should loop with a conditional jump back', () => {
      const program = [
        '10 i=0',
        '20 i=i+1',
        '30 if i<3 goto 20',
        '40 print i'
      ].join('\n');

      expect(basic.execute(program)).toBe('i = 0.0\ni = 1.0\ni = 2.0\ni = 3.0\n3.0\n');
      expect(basic.getStepCount()).toBe(8);
    });

    test('should jump with goto', () => {
      expect(basic.execute('goto 30\nprint 99\n30 print 1')).toBe('1.0\n');
    });

    test('should report a goto target that does not exist and continue', () => {
      expect(basic.execute('goto 50\nprint 1')).toBe("Error: 'goto' target line not found: 50\n1.0\n");
    });

    test('should ignore an if target that does not exist', () => {
      expect(basic.execute('if 1<2 goto 50\nprint 1')).toBe('1.0\n');
    });

    test('should resolve labels by prefix by default', () => {
      expect(basic.execute('goto 1\nprint 99\n10 print 1')).toBe('1.0\n');
    });

    test('should resolve labels exactly when configured', () => {
      basic.configure({ labelResolver: exactLabelResolver });
      expect(basic.execute('goto 1\nprint 99\n10 print 1')).toBe(
        "Error: 'goto' target line not found: 1\n99.0\n1.0\n"
      );
    });

    test('should report an if without goto', () => {
      expect(basic.execute('if 1<2 then 10')).toBe("Error: 'if' statement missing 'goto'\n");
    });
  });

  describe('Errors', () => {
    test('should report an undefined variable in print and continue', () => {
      expect(basic.execute('print y\nprint 2')).toBe(
        'Error evaluating print expression: Undefined variable: y\n2.0\n'
      );
    });

    test('should report a failed assignment by variable name', () => {
      expect(basic.execute('x=y+1')).toBe('Error evaluating expression for x: Undefined variable: y\n');
      expect(basic.getVariables()).toEqual({});
    });

    test('should report a failed if condition', () => {
      expect(basic.execute('if z>1 goto 10')).toBe("Error evaluating 'if' condition: Undefined variable: z\n");
    });

    test('should report unsupported statements', () => {
      expect(basic.execute('let x\nprint 1')).toBe('Error: Unsupported statement: let x\n1.0\n');
    });

    test('should never throw from run', () => {
      expect(() => basic.execute('print\nprint (\nx=\nif\ngoto\n)')).not.toThrow();
    });
  });

  describe('Step Ceiling', () => {
    test('should stop a runaway loop after exactly 100 steps', () => {
      expect(basic.execute('10 goto 10')).toBe(`${INFINITE_LOOP_ERROR}\n`);
      expect(basic.getStepCount()).toBe(DEFAULT_MAX_STEPS);
      expect(basic.wasHalted()).toBe(true);
    });

    test('should finish a program of exactly 100 steps ending in a newline', () => {
      const lines = Array.from({ length: 100 }, (_, i) => `print ${i}`);
      const expected = lines.map((_, i) => `${i}.0\n`).join('');

      expect(basic.execute(lines.join('\n') + '\n')).toBe(expected);
      expect(basic.getStepCount()).toBe(100);
      expect(basic.wasHalted()).toBe(false);
    });

    test('should not mark a normal run as halted', () => {
      basic.execute('print 1');
      expect(basic.wasHalted()).toBe(false);
    });

    test('should honour a configured ceiling', () => {
      const limited = new LineBasic({ maxSteps: 3 });
      expect(limited.execute('print 1\nprint 2\nprint 3\nprint 4')).toBe(
        `1.0\n2.0\n3.0\n${INFINITE_LOOP_ERROR}\n`
      );
    });

    test('should report the ceiling again when run without reloading', () => {
      basic.execute('10 goto 10');
      basic.run();
      expect(basic.getOutput()).toBe(`${INFINITE_LOOP_ERROR}\n${INFINITE_LOOP_ERROR}\n`);
      expect(basic.getStepCount()).toBe(100);
    });

    test('should fall back to the default for an invalid ceiling', () => {
      expect(new LineBasic({ maxSteps: NaN }).getConfig().maxSteps).toBe(DEFAULT_MAX_STEPS);
      expect(new LineBasic({ maxSteps: -5 }).getConfig().maxSteps).toBe(DEFAULT_MAX_STEPS);
    });
  });

  describe('clearVariables', () => {
    test('should empty the store and the output', () => {
      basic.execute('x=5');
      basic.clearVariables();
      expect(basic.getOutput()).toBe('');
      expect(basic.getVariables()).toEqual({});
    });

    test('should make a previously set variable undefined again', () => {
      basic.execute('x=5\nprint x');
      basic.clearVariables();
      expect(basic.execute('print x')).toBe('Error evaluating print expression: Undefined variable: x\n');
    });

    test('should keep the loaded program', () => {
      basic.load('print 1');
      basic.clearVariables();
      expect(basic.getProgram()).toEqual(['print 1']);
    });
  });

  describe('Instances', () => {
    test('should not share state', () => {
      const other = new LineBasic();
      basic.execute('x=1');
      expect(other.execute('print x')).toBe('Error evaluating print expression: Undefined variable: x\n');
    });
  });

  describe('Custom Statement Handlers', () => {
    test('should dispatch to a registered handler', () => {
      basic.registerStatement('print', (ctx) => {
        ctx.output.append(`> ${ctx.statement}`);
      });
      expect(basic.execute('10 print 1')).toBe('> print 1\n');

      basic.restoreStatement('print');
      expect(basic.execute('10 print 1')).toBe('1.0\n');
    });

    test('should record an exception from a handler as output', () => {
      basic.registerStatement('end', () => {
        throw new Error('boom');
      });
      expect(basic.execute('end\nprint 1')).toBe('Error: boom\n1.0\n');
    });
  });
});
