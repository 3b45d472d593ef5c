import { expectAssignable, expectType } from 'tsd';
import {
  Class,
  Container,
  Div,
  Element,
  P,
  find,
  scope,
  toQuery,
  type AttributeValue,
  type ComposeArg,
  type MarkupNode,
  type Query,
} from '../src/index';

// Factories build elements
expectType<Element>(Div());
expectType<Element>(P('text', Class('lead'), { id: 'main', hidden: true }));

// Operators always yield a container
expectType<Container>(P().plus(P()));
expectType<Container>(P().plus('tail'));
expectType<Container>(P().times(2));

// Index keys address children, string keys address attributes
expectType<MarkupNode>(Div(P()).get(0));
expectType<AttributeValue>(Div(Class('a')).get('class'));
expectType<MarkupNode>(Div(P()).delete(0));
expectType<boolean>(Div().delete('id'));

expectType<string>(Div().display({ pretty: false }));
expectType<MarkupNode[]>(find(Div(), 'needle'));
expectType<Query>(toQuery(P()));
expectType<number>(scope(Div(), () => 1));

expectAssignable<ComposeArg>([P(), ['nested', 1], null, false]);
