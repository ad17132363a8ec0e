/**
 * BPEL Loader & Interface Parsing Tests
 */

import { describe, it, expect } from '@jest/globals';
import { BPEL_NAMESPACES, loadBpelDocument } from '../src/parser/bpel';
import { mergeInterfaces, parseWsdl } from '../src/interfaces/wsdl';
import { parseXsd } from '../src/interfaces/xsd';
import { analysisErrorFrom, fixture } from './helpers';

describe('loadBpelDocument', () => {
  it('detects an executable BPEL 2.0 process', () => {
    const document = loadBpelDocument(fixture('OrderProcess.bpel'), 'OrderProcess.bpel');
    expect(document.version).toBe('2.0');
    expect(document.abstract).toBe(false);
    expect(document.process.namespace).toBe(BPEL_NAMESPACES.v20Executable);
  });

  it('detects abstract processes in both dialects', () => {
    const v20 = loadBpelDocument(`<process name="A" xmlns="${BPEL_NAMESPACES.v20Abstract}"/>`, 'a.bpel');
    expect(v20).toMatchObject({ version: '2.0', abstract: true });

    const v11 = loadBpelDocument(`<process name="B" abstractProcess="yes" xmlns="${BPEL_NAMESPACES.v11}"/>`, 'b.bpel');
    expect(v11).toMatchObject({ version: '1.1', abstract: true });
  });

  it('detects BPEL 1.1', () => {
    const document = loadBpelDocument(fixture('LoanApproval.bpel'), 'LoanApproval.bpel');
    expect(document.version).toBe('1.1');
    expect(document.abstract).toBe(false);
  });

  it('turns scanner failures into INVALID_XML with position details', () => {
    const error = analysisErrorFrom(() => loadBpelDocument('<process>\n  <sequence>\n</process>', 'p.bpel'));
    expect(error.code).toBe('INVALID_XML');
    expect(error.status).toBe(422);
    expect(error.message).toBe('p.bpel: Mismatched closing tag </process>, expected </sequence> (line 3, column 1)');
    expect(error.details).toEqual({ fileName: 'p.bpel', line: 3, column: 1 });
  });

  it('rejects documents that are not a process', () => {
    const error = analysisErrorFrom(() => loadBpelDocument('<definitions/>', 'x.bpel'));
    expect(error.code).toBe('NOT_BPEL');
    expect(error.message).toBe('x.bpel: root element <definitions> is not a BPEL <process>');
  });

  it('rejects unknown process namespaces', () => {
    const other = analysisErrorFrom(() => loadBpelDocument('<process xmlns="urn:other"/>', 'x.bpel'));
    expect(other.code).toBe('UNSUPPORTED_BPEL_VERSION');
    expect(other.message).toBe('x.bpel: unsupported process namespace "urn:other"');

    const none = analysisErrorFrom(() => loadBpelDocument('<process/>', 'y.bpel'));
    expect(none.message).toBe('y.bpel: unsupported process namespace "(none)"');
  });
});

describe('parseWsdl', () => {
  const wsdl = parseWsdl(fixture('OrderProcess.wsdl'), 'OrderProcess.wsdl');

  it('reads partner link types and their roles', () => {
    expect(wsdl.partnerLinkTypes).toEqual([
      {
        name: 'OrderProcessPLT',
        namespace: 'http://example.com/order',
        sourceFile: 'OrderProcess.wsdl',
        roles: [{ name: 'OrderProcessProvider', portType: 'tns:OrderProcessPT', portTypeNamespace: 'http://example.com/order' }],
      },
      {
        name: 'CreditPLT',
        namespace: 'http://example.com/order',
        sourceFile: 'OrderProcess.wsdl',
        roles: [{ name: 'CreditProvider', portType: 'tns:CreditPT', portTypeNamespace: 'http://example.com/order' }],
      },
    ]);
  });

  it('reads port type operations with their faults', () => {
    expect(wsdl.portTypes.map(p => p.name)).toEqual(['OrderProcessPT', 'CreditPT']);
    expect(wsdl.portTypes[1].operations).toEqual([
      {
        name: 'check',
        input: 'tns:CreditRequestMessage',
        output: 'tns:CreditResponseMessage',
        faults: [{ name: 'CreditFault', message: 'tns:CreditFaultMessage' }],
      },
    ]);
  });

  it('reads messages, services and embedded schemas', () => {
    expect(wsdl.messages).toHaveLength(5);
    expect(wsdl.messages[4]).toEqual({
      name: 'CreditFaultMessage',
      namespace: 'http://example.com/order',
      sourceFile: 'OrderProcess.wsdl',
      parts: [{ name: 'reason', type: 'xsd:string' }],
    });
    expect(wsdl.services).toEqual([
      {
        name: 'OrderProcessService',
        sourceFile: 'OrderProcess.wsdl',
        ports: [{ name: 'OrderProcessPort', binding: 'tns:OrderProcessBinding', address: 'http://localhost:8001/order' }],
      },
    ]);
    expect(wsdl.schemaTypes).toEqual([
      {
        name: 'OrderResponse',
        kind: 'element',
        namespace: 'http://example.com/order',
        sourceFile: 'OrderProcess.wsdl',
        type: 'xsd:string',
        fields: [],
        enumerations: [],
      },
    ]);
  });

  it('accepts the BPEL 1.1 nested port type form on roles', () => {
    const legacy = parseWsdl(
      '<definitions xmlns:plnk="urn:plnk"><plnk:partnerLinkType name="PLT"><plnk:role name="R"><plnk:portType name="tns:PT"/></plnk:role></plnk:partnerLinkType></definitions>',
      'legacy.wsdl'
    );
    expect(legacy.partnerLinkTypes[0].roles).toEqual([{ name: 'R', portType: 'tns:PT', portTypeNamespace: '' }]);
  });

  it('rejects documents that are not WSDL', () => {
    const error = analysisErrorFrom(() => parseWsdl(fixture('Order.xsd'), 'Order.xsd'));
    expect(error.code).toBe('INVALID_INTERFACE');
    expect(error.message).toBe('Order.xsd: root element <xsd:schema> is not a WSDL <definitions>');
  });

  it('reports malformed WSDL as INVALID_INTERFACE', () => {
    const error = analysisErrorFrom(() => parseWsdl('<definitions', 'bad.wsdl'));
    expect(error.code).toBe('INVALID_INTERFACE');
    expect(error.message).toBe("bad.wsdl: Unexpected '<' (line 1, column 1)");
  });

  it('merges definitions in the order given', () => {
    const merged = mergeInterfaces([wsdl, { ...wsdl, portTypes: [] }]);
    expect(merged.partnerLinkTypes).toHaveLength(4);
    expect(merged.portTypes).toHaveLength(2);
  });
});

describe('parseXsd', () => {
  const types = parseXsd(fixture('Order.xsd'), 'Order.xsd');

  it('reads top-level elements, complex and simple types', () => {
    expect(types.map(t => [t.name, t.kind])).toEqual([
      ['OrderRequest', 'element'],
      ['OrderLine', 'complexType'],
      ['OrderStatus', 'simpleType'],
    ]);
  });

  it('flattens content models into fields, marking attributes with @', () => {
    expect(types[0].fields).toEqual([
      { name: 'customerId', type: 'xsd:string' },
      { name: 'lines', type: 'tns:OrderLine', minOccurs: '1', maxOccurs: 'unbounded' },
      { name: '@channel', type: 'xsd:string', minOccurs: '1' },
    ]);
    expect(types[1].fields).toEqual([
      { name: 'sku', type: 'xsd:string' },
      { name: 'quantity', type: 'xsd:int', minOccurs: '0' },
    ]);
  });

  it('reads enumerations of simple types', () => {
    expect(types[2]).toMatchObject({ base: 'xsd:string', enumerations: ['NEW', 'APPROVED', 'REJECTED'] });
  });

  it('rejects documents that are not a schema', () => {
    const error = analysisErrorFrom(() => parseXsd(fixture('OrderProcess.wsdl'), 'OrderProcess.wsdl'));
    expect(error.code).toBe('INVALID_INTERFACE');
    expect(error.message).toBe('OrderProcess.wsdl: root element <definitions> is not an XML schema');
  });
});
